import type { BackingKind, CapabilityFlagBits, ResourceState } from './backing';
import type { DiagnosticSink } from './diagnostics';

/**
 * 分配统计
 *
 * fragmentationRatio: 0 表示空闲空间连续，趋近 1 表示空闲空间被切碎。
 * 该值不是单调的，释放和分配都可能让它升高或降低。
 */
export interface HeapAllocationStats {
    totalSize: number;
    usedSize: number;
    numAllocations: number;
    numFreeBlocks: number;
    largestFreeBlock: number;
    fragmentationRatio: number;
}

/**
 * Block 快照（按 offset 排序输出）
 */
export interface BlockInfo {
    offset: number;
    size: number;
    isFree: boolean;
}

export interface AllocationInfo {
    offset: number;
    size: number;
}

export interface SuballocatorOptions {
    elementCount: number;
    elementSize: number;
    alignment: number;
    /** 诊断用名称 */
    name?: string;
    /** 输出分配 / 释放的逐条日志 */
    verboseLogging?: boolean;
    sink?: DiagnosticSink;
}

export interface ManagedHeapConfig {
    elementCount: number;
    elementSize: number;
    /** 默认等于 elementSize */
    alignment?: number;
    backingKind: BackingKind;
    capabilityFlags: CapabilityFlagBits;
    initialAccessState: ResourceState;
    name?: string;
    verboseLogging?: boolean;
    sink?: DiagnosticSink;
}

export interface DualBufferChannelConfig {
    elementCount: number;
    elementSize: number;
    /** 默认等于 elementSize */
    alignment?: number;
    name?: string;
    verboseLogging?: boolean;
    sink?: DiagnosticSink;
}
