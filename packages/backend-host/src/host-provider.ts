/**
 * HostBackingProvider
 * 
 * 基于 host 内存的 backing store provider，用于 CPU-only 环境和测试。
 * 
 * 设计要点：
 * 1. host 可见类型（upload / readback / deviceUpload）持久映射
 * 2. deviceLocal 不映射，只有合成的设备地址
 * 3. 设备地址从 DEVICE_ADDRESS_BASE 开始按 64KB 对齐依次分配
 * 4. 可以注入创建失败 / 映射失败，用于测试初始化错误路径
 */

import {
    type BackingBufferDescriptor,
    type BackingKind,
    type BackingStoreFeatures,
    type BackingStoreProvider,
    isHostVisible,
} from '@suballoc/types';
import { Logger, alignUp } from '@suballoc/utils';
import { HostBuffer } from './host-buffer';

// ============================================================================
// Constants
// ============================================================================

/** 第一个 buffer 的设备地址 */
export const DEVICE_ADDRESS_BASE = 0x1_0000_0000n;

/** 设备地址对齐 (64 KB) */
export const DEVICE_ADDRESS_ALIGNMENT = 64 * 1024;

const logger = new Logger('HostBackingProvider');

// ============================================================================
// HostBackingProvider
// ============================================================================

export interface HostBackingProviderOptions {
    features?: Partial<BackingStoreFeatures>;
    /** 返回失败原因时，createBuffer 抛出 */
    failOn?: (descriptor: BackingBufferDescriptor) => string | undefined;
    /** 这些类型创建后不映射 */
    unmappableKinds?: readonly BackingKind[];
}

export class HostBackingProvider implements BackingStoreProvider {
    readonly features: BackingStoreFeatures;

    private readonly failOn?: (descriptor: BackingBufferDescriptor) => string | undefined;
    private readonly unmappableKinds: readonly BackingKind[];
    private readonly created: HostBuffer[] = [];
    private nextAddress: bigint = DEVICE_ADDRESS_BASE;

    constructor(options: HostBackingProviderOptions = {}) {
        this.features = {
            gpuUploadHeap: options.features?.gpuUploadHeap ?? false,
            manualWriteTracking: options.features?.manualWriteTracking ?? false,
        };
        this.failOn = options.failOn;
        this.unmappableKinds = options.unmappableKinds ?? [];
    }

    createBuffer(descriptor: BackingBufferDescriptor): HostBuffer {
        const failure = this.failOn?.(descriptor);
        if (failure !== undefined) {
            throw new Error(failure);
        }
        if (!Number.isSafeInteger(descriptor.byteSize) || descriptor.byteSize < 0) {
            throw new RangeError(`Invalid buffer size ${descriptor.byteSize} for ${descriptor.label}`);
        }
        if (descriptor.kind === 'deviceUpload' && !this.features.gpuUploadHeap) {
            throw new Error(`GPU upload heap not supported (${descriptor.label})`);
        }

        const deviceAddress = this.nextAddress;
        this.nextAddress += BigInt(alignUp(Math.max(descriptor.byteSize, 1), DEVICE_ADDRESS_ALIGNMENT));

        const buffer = new HostBuffer(descriptor, {
            deviceAddress,
            mapped: isHostVisible(descriptor.kind) && !this.unmappableKinds.includes(descriptor.kind),
        });
        this.created.push(buffer);

        logger.debug(`createBuffer: ${descriptor.label}, ${descriptor.byteSize} bytes, kind=${descriptor.kind}`);

        return buffer;
    }

    /** 所有创建过的 buffer（含已销毁） */
    get buffers(): readonly HostBuffer[] {
        return this.created;
    }

    get liveBufferCount(): number {
        return this.created.filter(buffer => !buffer.isDestroyed).length;
    }
}
