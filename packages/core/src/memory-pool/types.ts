/**
 * Heap Types
 * 
 * 常量、预设配置与错误类型
 */

import { type BackingKind, type CapabilityFlagBits, CapabilityFlags, ResourceState } from '@suballoc/types';

// ============================================================================
// Offsets
// ============================================================================

/**
 * 公开 offset 与内部 offset 的固定差值
 * 
 * 内部 offset 0 是合法位置，为了让 0 能表示“未分配”，
 * 返回给调用者的 offset 统一加上这个常量。
 */
export const RESERVED_OFFSET = 1;

/** 表示“没有分配”的公开 offset */
export const NO_ALLOCATION = 0;

// ============================================================================
// Heap Presets
// ============================================================================

export interface HeapPreset {
    backingKind: BackingKind;
    capabilityFlags: CapabilityFlagBits;
    initialAccessState: ResourceState;
}

/**
 * 常用的堆配置组合
 */
export const HeapPresets = {
    /** Shader 读写的显存堆 */
    STORAGE: {
        backingKind: 'deviceLocal',
        capabilityFlags: CapabilityFlags.UnorderedAccess,
        initialAccessState: ResourceState.Common,
    },

    /** CPU 写入、GPU 读取 */
    UPLOAD: {
        backingKind: 'hostUpload',
        capabilityFlags: CapabilityFlags.None,
        initialAccessState: ResourceState.GenericRead,
    },

    /** CPU 直写显存（需要 provider 支持） */
    DEVICE_UPLOAD: {
        backingKind: 'deviceUpload',
        capabilityFlags: CapabilityFlags.None,
        initialAccessState: ResourceState.GenericRead,
    },

    /** 拷贝回读 */
    READBACK: {
        backingKind: 'hostReadback',
        capabilityFlags: CapabilityFlags.None,
        initialAccessState: ResourceState.CopyDest,
    },
} as const satisfies Record<string, HeapPreset>;

// ============================================================================
// Errors
// ============================================================================

export class HeapError extends Error {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'HeapError';
    }
}

/**
 * 没有足够大的空闲 block
 * 
 * 调用者可以重试、降级或视为致命错误，但不能忽略。
 */
export class OutOfSpaceError extends HeapError {
    readonly requestedSize: number;
    readonly largestFreeBlock: number;

    constructor(heapName: string, requestedSize: number, largestFreeBlock: number) {
        super(`${heapName}: no free block can hold ${requestedSize} bytes (largest free block: ${largestFreeBlock})`);
        this.name = 'OutOfSpaceError';
        this.requestedSize = requestedSize;
        this.largestFreeBlock = largestFreeBlock;
    }
}

/**
 * 释放了一个不存在的分配，属于调用方 bug
 */
export class InvalidFreeError extends HeapError {
    readonly offset: number;

    constructor(heapName: string, offset: number) {
        super(`${heapName}: no live allocation at offset ${offset}`);
        this.name = 'InvalidFreeError';
        this.offset = offset;
    }
}

/**
 * 违反读写握手协议（例如没有 beginWrite 就 endWrite）
 */
export class ProtocolViolationError extends HeapError {
    constructor(message: string) {
        super(message);
        this.name = 'ProtocolViolationError';
    }
}

/**
 * 底层存储创建或映射失败，堆无法初始化
 */
export class BackingStoreError extends HeapError {
    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = 'BackingStoreError';
    }
}

/**
 * 持锁期间重入
 */
export class HeapLockError extends HeapError {
    constructor(heapName: string) {
        super(`${heapName}: lock is already held (re-entrant heap access)`);
        this.name = 'HeapLockError';
    }
}

/**
 * 内部簿记结构不一致
 */
export class HeapCorruptionError extends HeapError {
    constructor(heapName: string, reason: string) {
        super(`${heapName}: heap corrupted: ${reason}`);
        this.name = 'HeapCorruptionError';
    }
}
