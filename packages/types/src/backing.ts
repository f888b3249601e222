/**
 * Backing Store Contracts
 *
 * 堆管理器只负责 offset 簿记，真正的存储由外部 provider 提供。
 * 这里定义 provider 需要暴露的最小接口：
 * 1. 按字节大小和能力标志创建线性 buffer
 * 2. 可选的持久映射（host 可见指针）
 * 3. 可选的设备基地址
 * 4. 状态转换与区域拷贝（见 command.ts）
 */

// ============================================================================
// Resource State
// ============================================================================

/**
 * Buffer 的访问状态
 *
 * 同一时刻只能处于一种状态，状态之间通过 barrier 转换。
 */
export enum ResourceState {
    /** 默认 / 空闲 */
    Common = 'common',
    /** Shader 读写（UAV） */
    UnorderedAccess = 'unordered-access',
    /** 拷贝源 */
    CopySource = 'copy-source',
    /** 拷贝目标 */
    CopyDest = 'copy-dest',
    /** 只读（上传堆的常驻状态） */
    GenericRead = 'generic-read',
}

// ============================================================================
// Backing Kind & Capability
// ============================================================================

/**
 * 底层存储所在的内存类型
 *
 * - deviceLocal:  仅 GPU 可见
 * - hostUpload:   CPU 写、GPU 读
 * - hostReadback: GPU 写（拷贝）、CPU 读
 * - deviceUpload: 可被 CPU 直接写入的显存（需要硬件支持）
 */
export type BackingKind = 'deviceLocal' | 'hostUpload' | 'hostReadback' | 'deviceUpload';

/**
 * 需要被 CPU 映射的存储类型
 */
export const HOST_VISIBLE_KINDS: readonly BackingKind[] = ['hostUpload', 'hostReadback', 'deviceUpload'];

/**
 * 写入追踪只对上传类存储有意义
 */
export const UPLOAD_KINDS: readonly BackingKind[] = ['hostUpload', 'deviceUpload'];

export function isHostVisible(kind: BackingKind): boolean {
    return HOST_VISIBLE_KINDS.includes(kind);
}

/**
 * Buffer 能力标志（位集合）
 */
export const CapabilityFlags = {
    None: 0,
    /** 允许作为 UAV 绑定 */
    UnorderedAccess: 1 << 0,
    /** 允许调试工具手动追踪写入区间 */
    ManualWriteTracking: 1 << 1,
} as const;

export type CapabilityFlagBits = number;

export function hasCapability(flags: CapabilityFlagBits, flag: CapabilityFlagBits): boolean {
    return (flags & flag) === flag;
}

// ============================================================================
// Provider
// ============================================================================

/**
 * Provider 报告的可选特性
 */
export interface BackingStoreFeatures {
    /** 是否支持 deviceUpload 类型 */
    gpuUploadHeap: boolean;
    /** 是否支持手动写入追踪 */
    manualWriteTracking: boolean;
}

export interface BackingBufferDescriptor {
    /** 调试名 */
    label: string;
    /** 字节大小（已对齐） */
    byteSize: number;
    kind: BackingKind;
    capabilityFlags: CapabilityFlagBits;
    initialState: ResourceState;
}

/**
 * 写入区间 [begin, end)，相对于 buffer 起始位置
 */
export interface WriteRange {
    begin: number;
    end: number;
}

/**
 * 一块由 provider 创建的线性 buffer
 *
 * 堆对象独占持有该句柄，直到 dispose()。
 */
export interface BackingBuffer {
    readonly label: string;
    readonly byteSize: number;
    readonly kind: BackingKind;
    /** 持久映射的 host 视图，未映射时为 null */
    readonly mapped: Uint8Array | null;
    /** 设备基地址，不可用时为 null */
    readonly deviceAddress: bigint | null;
    /** 手动写入追踪；provider 不支持时不存在 */
    trackWrite?(range: WriteRange): void;
    unmap(): void;
    destroy(): void;
}

export interface BackingStoreProvider {
    readonly features: BackingStoreFeatures;
    /**
     * 创建 buffer
     *
     * 失败时直接抛出，堆的初始化随之中止。
     */
    createBuffer(descriptor: BackingBufferDescriptor): BackingBuffer;
}
