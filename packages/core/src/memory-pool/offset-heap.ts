/**
 * OffsetHeap
 * 
 * ManagedHeap 与 DualBufferChannel 的公共部分：
 * 一个 Suballocator + 一把锁 + 公开 offset 约定。
 * 
 * 公开 offset = 内部 offset + RESERVED_OFFSET，0 (NO_ALLOCATION) 表示未分配。
 * 调用者不应直接解释内部 offset。
 */

import { type BackingBuffer, type DiagnosticSink, type HeapAllocationStats, LogLevel } from '@suballoc/types';
import { Logger } from '@suballoc/utils';
import { HeapMutex } from './heap-mutex';
import { Suballocator } from './suballocator';
import { HeapError, NO_ALLOCATION, RESERVED_OFFSET } from './types';

export interface OffsetHeapOptions {
    elementCount: number;
    elementSize: number;
    alignment: number;
    name: string;
    verboseLogging: boolean;
    sink?: DiagnosticSink;
}

export abstract class OffsetHeap {
    readonly name: string;

    protected readonly allocator: Suballocator;
    protected readonly mutex: HeapMutex;
    protected readonly logger: Logger;

    private disposed: boolean = false;

    protected constructor(options: OffsetHeapOptions) {
        this.name = options.name;
        this.allocator = new Suballocator(options);
        this.mutex = new HeapMutex(options.name);
        this.logger = new Logger(options.name, {
            level: options.verboseLogging ? LogLevel.DEBUG : LogLevel.INFO,
            sink: options.sink,
        });
    }

    // ========================================================================
    // Allocation (locked)
    // ========================================================================

    /**
     * 分配 size 字节
     * 
     * @returns 公开 offset（永远不为 0）
     * @throws OutOfSpaceError
     */
    allocate(size: number): number {
        this.assertAlive();
        return this.mutex.runExclusive(() => this.allocator.allocate(size)) + RESERVED_OFFSET;
    }

    /**
     * 释放；传入 NO_ALLOCATION 时什么都不做
     * 
     * @throws InvalidFreeError
     */
    free(publicOffset: number): void {
        this.assertAlive();
        if (publicOffset === NO_ALLOCATION) {
            return;
        }
        const internal = publicOffset - RESERVED_OFFSET;
        this.mutex.runExclusive(() => this.allocator.free(internal));
    }

    getStats(): HeapAllocationStats {
        return this.mutex.runExclusive(() => this.allocator.getStats());
    }

    /**
     * 活跃分配的大小（已对齐）
     */
    allocationSize(publicOffset: number): number | undefined {
        if (publicOffset < RESERVED_OFFSET) {
            return undefined;
        }
        const internal = publicOffset - RESERVED_OFFSET;
        return this.mutex.runExclusive(() => this.allocator.sizeOf(internal));
    }

    // ========================================================================
    // Accessors
    // ========================================================================

    get elementSize(): number {
        return this.allocator.elementSize;
    }

    get alignment(): number {
        return this.allocator.alignment;
    }

    /** arena 字节大小（已对齐） */
    get byteSize(): number {
        return this.allocator.alignedSize;
    }

    get isDisposed(): boolean {
        return this.disposed;
    }

    // ========================================================================
    // Address Helpers
    // ========================================================================

    /**
     * 设备地址 = 基地址 + 内部 offset
     */
    protected addressIn(buffer: BackingBuffer, publicOffset: number): bigint | null {
        this.assertOffset(publicOffset);
        const base = buffer.deviceAddress;
        if (publicOffset === NO_ALLOCATION || publicOffset < RESERVED_OFFSET || base === null) {
            return null;
        }
        return base + BigInt(publicOffset - RESERVED_OFFSET);
    }

    /**
     * 映射视图：从内部 offset 开始，默认长度为分配大小
     */
    protected viewIn(buffer: BackingBuffer, publicOffset: number, byteLength?: number): Uint8Array | null {
        this.assertOffset(publicOffset);
        const mapped = buffer.mapped;
        if (publicOffset === NO_ALLOCATION || publicOffset < RESERVED_OFFSET || mapped === null) {
            return null;
        }
        const internal = publicOffset - RESERVED_OFFSET;
        const length = byteLength ?? this.allocationSize(publicOffset);
        if (length === undefined) {
            throw new RangeError(`${this.name}: no live allocation at offset ${publicOffset}`);
        }
        if (!Number.isSafeInteger(length) || length < 0 || internal + length > buffer.byteSize) {
            throw new RangeError(`${this.name}: view [${internal}, ${internal + length}) exceeds ${buffer.byteSize} bytes`);
        }
        return mapped.subarray(internal, internal + length);
    }

    private assertOffset(publicOffset: number): void {
        if (!Number.isSafeInteger(publicOffset)) {
            throw new RangeError(`${this.name}: offset ${publicOffset} is not an integer`);
        }
    }

    // ========================================================================
    // Lifecycle
    // ========================================================================

    protected assertAlive(): void {
        if (this.disposed) {
            throw new HeapError(`${this.name} has been disposed`);
        }
    }

    /**
     * 报告未释放的分配并释放底层存储，可重复调用
     */
    dispose(): void {
        if (this.disposed) {
            return;
        }
        this.disposed = true;
        this.allocator.reportLeaks();
        this.releaseBacking();
    }

    protected abstract releaseBacking(): void;
}
