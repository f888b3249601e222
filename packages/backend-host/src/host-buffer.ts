/**
 * HostBuffer
 * 
 * 用普通 ArrayBuffer 模拟的线性 buffer。
 * 
 * - contents: “设备侧”字节，命令录制器的拷贝直接作用于此
 * - mapped:   host 可见类型返回同一块内存的视图，unmap 之后为 null
 * - state:    当前访问状态，由 HostCommandRecorder 校验并更新
 */

import {
    type BackingBuffer,
    type BackingBufferDescriptor,
    type BackingKind,
    type CapabilityFlagBits,
    CapabilityFlags,
    ResourceState,
    type WriteRange,
    hasCapability,
} from '@suballoc/types';

export interface HostBufferOptions {
    deviceAddress: bigint | null;
    /** 是否持久映射 */
    mapped: boolean;
}

export class HostBuffer implements BackingBuffer {
    readonly label: string;
    readonly byteSize: number;
    readonly kind: BackingKind;
    readonly capabilityFlags: CapabilityFlagBits;
    readonly deviceAddress: bigint | null;
    readonly contents: Uint8Array;

    /** 当前访问状态 */
    state: ResourceState;

    /** 手动写入追踪记录，只有带 ManualWriteTracking 能力时存在 trackWrite */
    readonly writtenRanges: WriteRange[] = [];
    readonly trackWrite?: (range: WriteRange) => void;

    private isMapped: boolean;
    private destroyed: boolean = false;

    constructor(descriptor: BackingBufferDescriptor, options: HostBufferOptions) {
        this.label = descriptor.label;
        this.byteSize = descriptor.byteSize;
        this.kind = descriptor.kind;
        this.capabilityFlags = descriptor.capabilityFlags;
        this.state = descriptor.initialState;
        this.deviceAddress = options.deviceAddress;
        this.contents = new Uint8Array(descriptor.byteSize);
        this.isMapped = options.mapped;

        if (hasCapability(descriptor.capabilityFlags, CapabilityFlags.ManualWriteTracking)) {
            this.trackWrite = (range: WriteRange): void => {
                this.assertNotDestroyed();
                if (range.begin < 0 || range.end > this.byteSize || range.begin > range.end) {
                    throw new RangeError(`${this.label}: write range [${range.begin}, ${range.end}) is outside the buffer`);
                }
                this.writtenRanges.push({ begin: range.begin, end: range.end });
            };
        }
    }

    get mapped(): Uint8Array | null {
        return this.isMapped && !this.destroyed ? this.contents : null;
    }

    get isDestroyed(): boolean {
        return this.destroyed;
    }

    unmap(): void {
        this.assertNotDestroyed();
        this.isMapped = false;
    }

    destroy(): void {
        this.assertNotDestroyed();
        this.isMapped = false;
        this.destroyed = true;
    }

    assertNotDestroyed(): void {
        if (this.destroyed) {
            throw new Error(`${this.label} has been destroyed`);
        }
    }
}
