/**
 * Suballocator
 *
 * 把一块固定大小的 arena 切分成可变大小的区域，以字节 offset 的形式交给调用者。
 *
 * 设计要点：
 * 1. Best-fit：在 FreeSizeIndex 上做 lower bound 查询
 * 2. 分配时按需 split，释放时只与相邻 block 合并
 * 3. BlockTable 存 block，offsetIndex / FreeSizeIndex 只存句柄
 * 4. 只处理 offset 和 size，不关心底层存储
 *
 * 不是线程安全的，并发访问由外层堆对象加锁。
 */

import { type AllocationInfo, type BlockInfo, type HeapAllocationStats, LogLevel, type SuballocatorOptions } from '@suballoc/types';
import { Logger, alignUp } from '@suballoc/utils';
import { type BlockHandle, BlockTable, NIL_BLOCK } from './block-table';
import { FreeSizeIndex } from './free-size-index';
import { HeapCorruptionError, InvalidFreeError, OutOfSpaceError } from './types';

// ============================================================================
// Types
// ============================================================================

interface AllocationRecord {
    offset: number;
    size: number;
    block: BlockHandle;
}

const DEFAULT_NAME = 'Unnamed Suballocator';

// ============================================================================
// Suballocator
// ============================================================================

export class Suballocator {
    readonly name: string;
    readonly elementCount: number;
    readonly elementSize: number;
    readonly alignment: number;
    /** arena 总大小（已对齐） */
    readonly alignedSize: number;

    private readonly logger: Logger;

    private readonly blocks: BlockTable = new BlockTable();
    /** block 起始 offset → 句柄，每个 block 恰好一项 */
    private readonly offsetIndex: Map<number, BlockHandle> = new Map();
    /** 只包含空闲 block */
    private readonly freeIndex: FreeSizeIndex = new FreeSizeIndex();
    /** 活跃分配，按 offset 索引 */
    private readonly allocations: Map<number, AllocationRecord> = new Map();

    private usedBytes: number = 0;

    constructor(options: SuballocatorOptions) {
        const { elementCount, elementSize, alignment } = options;

        if (!Number.isSafeInteger(elementCount) || elementCount < 0) {
            throw new RangeError(`elementCount must be a non-negative integer, got ${elementCount}`);
        }
        if (!Number.isSafeInteger(elementSize) || elementSize <= 0) {
            throw new RangeError(`elementSize must be a positive integer, got ${elementSize}`);
        }

        this.name = options.name ?? DEFAULT_NAME;
        this.elementCount = elementCount;
        this.elementSize = elementSize;
        this.alignment = alignment;
        this.alignedSize = alignUp(elementCount * elementSize, alignment);

        this.logger = new Logger(this.name, {
            level: options.verboseLogging ? LogLevel.DEBUG : LogLevel.WARN,
            sink: options.sink,
        });

        // 初始状态：一个覆盖整个 arena 的空闲 block
        if (this.alignedSize > 0) {
            const initial = this.blocks.create(0, this.alignedSize, true);
            this.blocks.linkFirst(initial);
            this.offsetIndex.set(0, initial);
            this.freeIndex.insert(this.alignedSize, 0, initial);
        }
    }

    // ========================================================================
    // Allocation
    // ========================================================================

    /**
     * 分配一块区域
     *
     * size 为 0 时按最小对齐单位分配。
     *
     * @returns arena 内的字节 offset
     * @throws OutOfSpaceError 没有足够大的空闲 block；此时内部状态不变
     */
    allocate(requestedSize: number): number {
        if (!Number.isSafeInteger(requestedSize) || requestedSize < 0) {
            throw new RangeError(`${this.name}: allocation size must be a non-negative integer, got ${requestedSize}`);
        }

        const alignedSize = requestedSize === 0
            ? this.alignment
            : alignUp(requestedSize, this.alignment);

        const fit = this.freeIndex.lowerBound(alignedSize);
        if (fit === null) {
            const largest = this.freeIndex.largest;
            this.logger.warn(`Allocation failed - no suitable block found for ${alignedSize} bytes (largest free block: ${largest})`);
            throw new OutOfSpaceError(this.name, alignedSize, largest);
        }

        const block = fit.handle;
        const offset = fit.offset;

        this.freeIndex.remove(fit.size, fit.offset);

        if (fit.size > alignedSize) {
            this.split(block, alignedSize);
        }

        this.blocks.setFree(block, false);
        this.allocations.set(offset, { offset, size: alignedSize, block });
        this.usedBytes += alignedSize;

        this.logger.debug(`Allocated ${alignedSize} bytes at internal offset ${offset}`);

        return offset;
    }

    /**
     * 把 block 切成 [used 前缀 size 字节] + [free 后缀]
     */
    private split(block: BlockHandle, size: number): void {
        const offset = this.blocks.offsetOf(block);
        const remainder = this.blocks.sizeOf(block) - size;

        const suffix = this.blocks.insertAfter(block, offset + size, remainder, true);
        this.blocks.setSize(block, size);

        this.offsetIndex.set(offset + size, suffix);
        this.freeIndex.insert(remainder, offset + size, suffix);
    }

    // ========================================================================
    // Free
    // ========================================================================

    /**
     * 释放一块区域并与相邻空闲 block 合并
     *
     * @throws InvalidFreeError offset 不是活跃分配的起始位置
     */
    free(offset: number): void {
        const record = this.allocations.get(offset);
        if (record === undefined) {
            this.logger.force(LogLevel.ERROR, `Free failed - no allocation found at offset ${offset}`);
            throw new InvalidFreeError(this.name, offset);
        }

        const block = record.block;
        this.blocks.setFree(block, true);
        this.allocations.delete(offset);
        this.usedBytes -= record.size;

        this.coalesce(block);

        this.logger.debug(`Freed ${record.size} bytes at offset ${offset}`);
    }

    /**
     * 只与直接相邻的前后 block 合并
     *
     * 相邻的两个空闲 block 永远不会同时存在，所以每侧最多合并一次。
     */
    private coalesce(freed: BlockHandle): void {
        let block = freed;

        const prev = this.blocks.prevOf(block);
        if (prev !== NIL_BLOCK && this.blocks.isFree(prev)) {
            const prevOffset = this.blocks.offsetOf(prev);
            const prevSize = this.blocks.sizeOf(prev);
            const offset = this.blocks.offsetOf(block);

            if (prevOffset + prevSize === offset) {
                this.freeIndex.remove(prevSize, prevOffset);
                this.blocks.setSize(prev, prevSize + this.blocks.sizeOf(block));
                this.offsetIndex.delete(offset);
                this.blocks.remove(block);
                block = prev;
            }
        }

        const offset = this.blocks.offsetOf(block);
        const size = this.blocks.sizeOf(block);
        const next = this.offsetIndex.get(offset + size);
        if (next !== undefined && this.blocks.isFree(next)) {
            const nextSize = this.blocks.sizeOf(next);
            this.freeIndex.remove(nextSize, offset + size);
            this.blocks.setSize(block, size + nextSize);
            this.offsetIndex.delete(offset + size);
            this.blocks.remove(next);
        }

        this.freeIndex.insert(this.blocks.sizeOf(block), offset, block);
    }

    // ========================================================================
    // Statistics
    // ========================================================================

    getStats(): HeapAllocationStats {
        const totalSize = this.alignedSize;
        const usedSize = this.usedBytes;
        const largestFreeBlock = this.freeIndex.largest;
        const freeSpace = totalSize - usedSize;

        const fragmentationRatio = freeSpace > 0 && largestFreeBlock > 0
            ? 1 - largestFreeBlock / freeSpace
            : 0;

        return {
            totalSize,
            usedSize,
            numAllocations: this.allocations.size,
            numFreeBlocks: this.freeIndex.count,
            largestFreeBlock,
            fragmentationRatio,
        };
    }

    // ========================================================================
    // Inspection
    // ========================================================================

    /**
     * 活跃分配的大小（已对齐），不存在时为 undefined
     */
    sizeOf(offset: number): number | undefined {
        return this.allocations.get(offset)?.size;
    }

    hasAllocation(offset: number): boolean {
        return this.allocations.has(offset);
    }

    get allocationCount(): number {
        return this.allocations.size;
    }

    /**
     * 按 offset 排序的 block 快照
     */
    snapshot(): BlockInfo[] {
        const result: BlockInfo[] = [];
        for (const handle of this.blocks.handles()) {
            result.push({
                offset: this.blocks.offsetOf(handle),
                size: this.blocks.sizeOf(handle),
                isFree: this.blocks.isFree(handle),
            });
        }
        return result;
    }

    liveAllocations(): AllocationInfo[] {
        return Array.from(this.allocations.values(), ({ offset, size }) => ({ offset, size }))
            .sort((a, b) => a.offset - b.offset);
    }

    /**
     * 报告仍未释放的分配
     *
     * @returns 未释放的分配数量
     */
    reportLeaks(): number {
        const live = this.liveAllocations();
        if (live.length === 0) {
            return 0;
        }
        this.logger.warn(`Warning - there are still ${live.length} allocations`);
        for (const allocation of live) {
            this.logger.warn(`Allocation - offset=${allocation.offset}, size=${allocation.size}`);
        }
        return live.length;
    }

    /**
     * 全量校验内部结构
     *
     * 时间复杂度 O(n)，用于测试和调试。
     *
     * @throws HeapCorruptionError
     */
    validate(): void {
        const fail = (reason: string): never => {
            throw new HeapCorruptionError(this.name, reason);
        };

        let expectedOffset = 0;
        let previousFree = false;
        let blockCount = 0;
        let freeCount = 0;
        let usedCount = 0;
        let usedBytes = 0;
        let prev: BlockHandle = NIL_BLOCK;

        for (const handle of this.blocks.handles()) {
            const offset = this.blocks.offsetOf(handle);
            const size = this.blocks.sizeOf(handle);
            const isFree = this.blocks.isFree(handle);

            if (this.blocks.prevOf(handle) !== prev) fail(`broken back link at offset ${offset}`);
            if (offset !== expectedOffset) fail(`gap or overlap at offset ${offset}, expected ${expectedOffset}`);
            if (size <= 0) fail(`empty block at offset ${offset}`);
            if (this.offsetIndex.get(offset) !== handle) fail(`offset index does not map ${offset} to its block`);

            if (isFree) {
                if (previousFree) fail(`adjacent free blocks at offset ${offset}`);
                if (!this.freeIndex.has(size, offset)) fail(`free block at offset ${offset} missing from size index`);
                freeCount++;
            } else {
                const record = this.allocations.get(offset);
                if (record === undefined) fail(`used block at offset ${offset} has no allocation record`);
                else if (record.block !== handle || record.size !== size) fail(`allocation record mismatch at offset ${offset}`);
                usedCount++;
                usedBytes += size;
            }

            previousFree = isFree;
            expectedOffset = offset + size;
            prev = handle;
            blockCount++;
        }

        if (expectedOffset !== this.alignedSize) fail(`blocks cover ${expectedOffset} bytes, arena is ${this.alignedSize}`);
        if (blockCount !== this.blocks.count) fail(`block chain has ${blockCount} blocks, table holds ${this.blocks.count}`);
        if (this.offsetIndex.size !== blockCount) fail(`offset index has ${this.offsetIndex.size} entries for ${blockCount} blocks`);
        if (this.freeIndex.count !== freeCount) fail(`size index has ${this.freeIndex.count} entries for ${freeCount} free blocks`);
        if (this.allocations.size !== usedCount) fail(`${this.allocations.size} allocation records for ${usedCount} used blocks`);
        if (this.usedBytes !== usedBytes) fail(`used byte counter ${this.usedBytes} differs from ${usedBytes}`);
    }
}
