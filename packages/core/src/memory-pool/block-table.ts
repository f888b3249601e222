/**
 * BlockTable
 *
 * 使用分页 TypedArray 存储 Block 元数据，避免每个 block 一个 JS 对象。
 *
 * 设计要点：
 * 1. Struct of Arrays (SoA) 布局
 * 2. 分页结构支持动态增长
 * 3. 空闲槽位链表实现 O(1) 句柄分配/回收
 * 4. 所有 block 通过 prev/next 串成按 offset 排序的双向链表
 * 5. 句柄是稳定的整数槽位号，配合 generation 检测失效句柄
 */

// ============================================================================
// Constants
// ============================================================================

/** 每页的 slot 数量 */
const PAGE_SIZE = 1024;

/** 空句柄 */
export const NIL_BLOCK = -1;

// ============================================================================
// SoA 字段索引
// ============================================================================

/** Float64 字段：offset / size 可能超过 2^31 */
const SPAN_FIELDS = 2;
const SPAN_OFFSET = 0;
const SPAN_SIZE = 1;

/** Int32 字段 */
const LINK_FIELDS = 4;
const LINK_PREV = 0;
const LINK_NEXT = 1;
const LINK_FLAGS = 2;
const LINK_GENERATION = 3;

const FLAG_LIVE = 1 << 0;
const FLAG_FREE = 1 << 1;

/**
 * Block 句柄：槽位号
 */
export type BlockHandle = number;

interface Page {
    /** [offset, size] × PAGE_SIZE */
    spans: Float64Array;
    /** [prev, next, flags, generation] × PAGE_SIZE */
    links: Int32Array;
}

// ============================================================================
// BlockTable
// ============================================================================

export class BlockTable {
    private pages: Page[] = [];
    private nextSlot: number = 0;
    /** 空闲槽位链表头，复用 next 字段串联 */
    private freeHead: number = NIL_BLOCK;
    private _head: BlockHandle = NIL_BLOCK;
    private _count: number = 0;

    constructor() {
        this.allocatePage();
    }

    // ========================================================================
    // Page Management
    // ========================================================================

    private allocatePage(): void {
        const links = new Int32Array(PAGE_SIZE * LINK_FIELDS);
        for (let i = 0; i < PAGE_SIZE; i++) {
            const base = i * LINK_FIELDS;
            links[base + LINK_PREV] = NIL_BLOCK;
            links[base + LINK_NEXT] = NIL_BLOCK;
        }
        this.pages.push({
            spans: new Float64Array(PAGE_SIZE * SPAN_FIELDS),
            links,
        });
    }

    private page(handle: BlockHandle): Page {
        const pageIndex = Math.floor(handle / PAGE_SIZE);
        const page = this.pages[pageIndex];
        if (handle < 0 || page === undefined) {
            throw new RangeError(`Block handle ${handle} is out of range`);
        }
        return page;
    }

    private spanBase(handle: BlockHandle): number {
        return (handle % PAGE_SIZE) * SPAN_FIELDS;
    }

    private linkBase(handle: BlockHandle): number {
        return (handle % PAGE_SIZE) * LINK_FIELDS;
    }

    private getLink(handle: BlockHandle, field: number): number {
        return this.page(handle).links[this.linkBase(handle) + field];
    }

    private setLink(handle: BlockHandle, field: number, value: number): void {
        this.page(handle).links[this.linkBase(handle) + field] = value;
    }

    // ========================================================================
    // Slot Allocation
    // ========================================================================

    /**
     * 创建一个未链接的 block
     *
     * 时间复杂度: O(1)
     */
    create(offset: number, size: number, isFree: boolean): BlockHandle {
        let handle: BlockHandle;

        if (this.freeHead !== NIL_BLOCK) {
            handle = this.freeHead;
            this.freeHead = this.getLink(handle, LINK_NEXT);
        } else {
            handle = this.nextSlot++;
            if (Math.floor(handle / PAGE_SIZE) >= this.pages.length) {
                this.allocatePage();
            }
        }

        const page = this.page(handle);
        const span = this.spanBase(handle);
        const link = this.linkBase(handle);

        page.spans[span + SPAN_OFFSET] = offset;
        page.spans[span + SPAN_SIZE] = size;
        page.links[link + LINK_PREV] = NIL_BLOCK;
        page.links[link + LINK_NEXT] = NIL_BLOCK;
        page.links[link + LINK_FLAGS] = FLAG_LIVE | (isFree ? FLAG_FREE : 0);

        this._count++;
        return handle;
    }

    /**
     * 回收槽位，generation 递增使旧句柄失效
     *
     * 调用前必须已经 unlink。
     */
    release(handle: BlockHandle): void {
        this.assertLive(handle);

        const page = this.page(handle);
        const link = this.linkBase(handle);

        page.links[link + LINK_FLAGS] = 0;
        page.links[link + LINK_GENERATION]++;
        page.links[link + LINK_PREV] = NIL_BLOCK;
        page.links[link + LINK_NEXT] = this.freeHead;
        this.freeHead = handle;

        this._count--;
    }

    // ========================================================================
    // Ordered Chain
    // ========================================================================

    /**
     * 作为唯一 block 挂到链表头（仅用于初始化空表）
     */
    linkFirst(handle: BlockHandle): void {
        if (this._head !== NIL_BLOCK) {
            throw new Error('BlockTable already has a head block');
        }
        this.assertLive(handle);
        this._head = handle;
    }

    /**
     * 在 anchor 之后插入新 block（split 用）
     */
    insertAfter(anchor: BlockHandle, offset: number, size: number, isFree: boolean): BlockHandle {
        this.assertLive(anchor);

        const handle = this.create(offset, size, isFree);
        const next = this.getLink(anchor, LINK_NEXT);

        this.setLink(handle, LINK_PREV, anchor);
        this.setLink(handle, LINK_NEXT, next);
        this.setLink(anchor, LINK_NEXT, handle);
        if (next !== NIL_BLOCK) {
            this.setLink(next, LINK_PREV, handle);
        }

        return handle;
    }

    /**
     * 从链表移除并回收（merge 用）
     */
    remove(handle: BlockHandle): void {
        this.assertLive(handle);

        const prev = this.getLink(handle, LINK_PREV);
        const next = this.getLink(handle, LINK_NEXT);

        if (prev !== NIL_BLOCK) {
            this.setLink(prev, LINK_NEXT, next);
        } else {
            this._head = next;
        }
        if (next !== NIL_BLOCK) {
            this.setLink(next, LINK_PREV, prev);
        }

        this.release(handle);
    }

    // ========================================================================
    // Field Accessors
    // ========================================================================

    offsetOf(handle: BlockHandle): number {
        return this.page(handle).spans[this.spanBase(handle) + SPAN_OFFSET];
    }

    sizeOf(handle: BlockHandle): number {
        return this.page(handle).spans[this.spanBase(handle) + SPAN_SIZE];
    }

    setSize(handle: BlockHandle, size: number): void {
        this.page(handle).spans[this.spanBase(handle) + SPAN_SIZE] = size;
    }

    isFree(handle: BlockHandle): boolean {
        return (this.getLink(handle, LINK_FLAGS) & FLAG_FREE) !== 0;
    }

    setFree(handle: BlockHandle, isFree: boolean): void {
        const flags = this.getLink(handle, LINK_FLAGS);
        this.setLink(handle, LINK_FLAGS, isFree ? flags | FLAG_FREE : flags & ~FLAG_FREE);
    }

    prevOf(handle: BlockHandle): BlockHandle {
        return this.getLink(handle, LINK_PREV);
    }

    nextOf(handle: BlockHandle): BlockHandle {
        return this.getLink(handle, LINK_NEXT);
    }

    isLive(handle: BlockHandle): boolean {
        if (handle < 0 || handle >= this.nextSlot) return false;
        return (this.getLink(handle, LINK_FLAGS) & FLAG_LIVE) !== 0;
    }

    generationOf(handle: BlockHandle): number {
        return this.getLink(handle, LINK_GENERATION);
    }

    private assertLive(handle: BlockHandle): void {
        if (!this.isLive(handle)) {
            throw new RangeError(`Block handle ${handle} is not live`);
        }
    }

    // ========================================================================
    // Inspection
    // ========================================================================

    get head(): BlockHandle {
        return this._head;
    }

    /** 活跃 block 数量 */
    get count(): number {
        return this._count;
    }

    /** 已分配的槽位页数 */
    get pageCount(): number {
        return this.pages.length;
    }

    /**
     * 按 offset 顺序遍历所有 block
     */
    *handles(): Generator<BlockHandle> {
        for (let h = this._head; h !== NIL_BLOCK; h = this.getLink(h, LINK_NEXT)) {
            yield h;
        }
    }
}
