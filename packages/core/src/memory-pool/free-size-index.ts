/**
 * FreeSizeIndex
 *
 * 按 size 排序的空闲 block 索引，回答“最小的 ≥ N 的空闲 block”。
 *
 * 设计要点：
 * 1. 有序数组，键为 (size, offset)，同 size 时 offset 小的在前
 * 2. 查找为二分，O(log n)
 * 3. 插入/删除需要搬移数组尾部，n 为空闲 block 数
 *    （因为相邻空闲 block 总会被合并，n 通常很小）
 */

import type { BlockHandle } from './block-table';

export interface FreeEntry {
    size: number;
    offset: number;
    handle: BlockHandle;
}

export class FreeSizeIndex {
    private entries: FreeEntry[] = [];

    /** 总空闲字节数 */
    private _totalFreeBytes: number = 0;

    // ========================================================================
    // Search
    // ========================================================================

    /**
     * 第一个键 ≥ (size, offset) 的位置
     */
    private search(size: number, offset: number): number {
        let lo = 0;
        let hi = this.entries.length;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            const entry = this.entries[mid];
            if (entry.size < size || (entry.size === size && entry.offset < offset)) {
                lo = mid + 1;
            } else {
                hi = mid;
            }
        }
        return lo;
    }

    /**
     * Best-fit 查询：最小的 size ≥ 请求大小的 block
     *
     * 同样大小时返回 offset 最小的那个。
     */
    lowerBound(size: number): FreeEntry | null {
        const index = this.search(size, -Infinity);
        return this.entries[index] ?? null;
    }

    // ========================================================================
    // Core Operations
    // ========================================================================

    insert(size: number, offset: number, handle: BlockHandle): void {
        const index = this.search(size, offset);
        const existing = this.entries[index];
        if (existing !== undefined && existing.size === size && existing.offset === offset) {
            throw new Error(`Free block at offset ${offset} (size ${size}) is already indexed`);
        }
        this.entries.splice(index, 0, { size, offset, handle });
        this._totalFreeBytes += size;
    }

    /**
     * 删除精确匹配的条目
     *
     * @returns 是否找到
     */
    remove(size: number, offset: number): boolean {
        const index = this.search(size, offset);
        const entry = this.entries[index];
        if (entry === undefined || entry.size !== size || entry.offset !== offset) {
            return false;
        }
        this.entries.splice(index, 1);
        this._totalFreeBytes -= size;
        return true;
    }

    has(size: number, offset: number): boolean {
        const entry = this.entries[this.search(size, offset)];
        return entry !== undefined && entry.size === size && entry.offset === offset;
    }

    clear(): void {
        this.entries = [];
        this._totalFreeBytes = 0;
    }

    // ========================================================================
    // Statistics
    // ========================================================================

    /** 最大空闲 block 的大小，没有时为 0 */
    get largest(): number {
        const last = this.entries[this.entries.length - 1];
        return last === undefined ? 0 : last.size;
    }

    get count(): number {
        return this.entries.length;
    }

    get totalFreeBytes(): number {
        return this._totalFreeBytes;
    }

    /**
     * 按 (size, offset) 顺序输出所有条目
     */
    snapshot(): FreeEntry[] {
        return this.entries.map(entry => ({ ...entry }));
    }
}
