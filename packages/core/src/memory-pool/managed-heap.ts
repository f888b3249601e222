/**
 * ManagedHeap
 *
 * 一块 backing buffer + 一个 Suballocator。
 *
 * 职责：
 * 1. 初始化时按配置创建 buffer，host 可见的类型必须能映射
 * 2. 加锁分配 / 释放 / 统计
 * 3. 公开 offset → 设备地址 / 映射视图
 * 4. 追踪 buffer 的当前访问状态并录制 barrier
 *
 * 注意：transitionTo / uavBarrier 不加锁。调用者必须保证同一个堆的
 * 状态转换只来自一条命令录制序列。
 */

import {
    type BackingBuffer,
    type BackingKind,
    type BackingStoreProvider,
    type CapabilityFlagBits,
    CapabilityFlags,
    type CommandRecorder,
    LogLevel,
    type ManagedHeapConfig,
    ResourceState,
    UPLOAD_KINDS,
    type WriteRange,
    isHostVisible,
} from '@suballoc/types';
import { OffsetHeap } from './offset-heap';
import { BackingStoreError } from './types';

const DEFAULT_NAME = 'Unnamed ManagedHeap';

export class ManagedHeap extends OffsetHeap {
    readonly backingKind: BackingKind;
    readonly capabilityFlags: CapabilityFlagBits;

    private readonly buffer: BackingBuffer;
    private state: ResourceState;
    private readonly writeTracking: boolean;

    constructor(provider: BackingStoreProvider, config: ManagedHeapConfig) {
        const name = config.name ?? DEFAULT_NAME;
        super({
            elementCount: config.elementCount,
            elementSize: config.elementSize,
            alignment: config.alignment ?? config.elementSize,
            name,
            verboseLogging: config.verboseLogging ?? false,
            sink: config.sink,
        });

        const kind = config.backingKind;
        if (kind === 'deviceUpload' && !provider.features.gpuUploadHeap) {
            this.logger.force(LogLevel.ERROR, 'GPU upload heap not supported');
            throw new BackingStoreError(`${name}: backing kind 'deviceUpload' is not supported by the provider`);
        }

        // 上传类存储在 provider 支持时打开手动写入追踪
        this.writeTracking = UPLOAD_KINDS.includes(kind) && provider.features.manualWriteTracking;
        this.backingKind = kind;
        this.capabilityFlags = this.writeTracking
            ? config.capabilityFlags | CapabilityFlags.ManualWriteTracking
            : config.capabilityFlags;

        try {
            this.buffer = provider.createBuffer({
                label: `Buffer managed by ${name} (${kind})`,
                byteSize: this.byteSize,
                kind,
                capabilityFlags: this.capabilityFlags,
                initialState: config.initialAccessState,
            });
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            this.logger.force(LogLevel.ERROR, `Failed to create the resource: ${reason}`);
            throw new BackingStoreError(`${name}: failed to create backing buffer: ${reason}`, { cause: err });
        }

        if (isHostVisible(kind) && this.buffer.mapped === null) {
            this.buffer.destroy();
            this.logger.force(LogLevel.ERROR, 'Failed to map the resource');
            throw new BackingStoreError(`${name}: host-visible buffer of kind '${kind}' could not be mapped`);
        }

        this.state = config.initialAccessState;

        this.logger.info(
            `initialized: Type=${kind}, Size=${Math.floor(this.byteSize / 1024)}KB, ` +
            `ElementSize=${config.elementSize}B, NumElements=${config.elementCount}`
        );
    }

    // ========================================================================
    // Addressing
    // ========================================================================

    /**
     * 分配对应的设备地址；sentinel 或没有基地址时为 null
     */
    deviceAddress(publicOffset: number): bigint | null {
        return this.addressIn(this.buffer, publicOffset);
    }

    /**
     * 分配对应的映射视图；sentinel 或 buffer 未映射时为 null
     *
     * @param byteLength 默认为分配大小
     */
    mappedView(publicOffset: number, byteLength?: number): Uint8Array | null {
        return this.viewIn(this.buffer, publicOffset, byteLength);
    }

    /** 底层 buffer（堆持有所有权，调用者只借用） */
    get resource(): BackingBuffer {
        return this.buffer;
    }

    // ========================================================================
    // State Transitions
    // ========================================================================

    get currentState(): ResourceState {
        return this.state;
    }

    /**
     * 转换到 newState；已处于该状态时不录制任何命令
     */
    transitionTo(recorder: CommandRecorder, newState: ResourceState): void {
        this.assertAlive();
        if (this.state === newState) {
            return;
        }
        recorder.resourceBarrier([{ buffer: this.buffer, before: this.state, after: newState }]);
        this.state = newState;
    }

    /**
     * UAV barrier：两次 shader 写之间保证可见性
     */
    uavBarrier(recorder: CommandRecorder): void {
        this.assertAlive();
        recorder.uavBarrier(this.buffer);
    }

    // ========================================================================
    // Write Tracking
    // ========================================================================

    get isWriteTrackingEnabled(): boolean {
        return this.writeTracking;
    }

    /**
     * 向调试工具报告写入区间（相对 buffer 起始）
     *
     * 未启用写入追踪时什么都不做。
     */
    trackWrite(range: WriteRange): void {
        if (!this.writeTracking || this.buffer.trackWrite === undefined) {
            return;
        }
        this.buffer.trackWrite(range);
        this.logger.debug(`TrackWrite: Range [${range.begin}, ${range.end}]`);
    }

    // ========================================================================
    // Lifecycle
    // ========================================================================

    protected releaseBacking(): void {
        if (this.buffer.mapped !== null) {
            this.buffer.unmap();
        }
        this.buffer.destroy();
    }
}
