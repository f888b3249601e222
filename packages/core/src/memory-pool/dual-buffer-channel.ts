/**
 * DualBufferChannel
 *
 * GPU 写入 + CPU 回读的双 buffer 通道。
 *
 * 设计要点：
 * 1. writable mirror（deviceLocal, UAV）供 shader 写入
 * 2. readable mirror（hostReadback, 持久映射）供 CPU 读取
 * 3. 两个 mirror 共享一个 Suballocator，同一个 offset 在两边都有效
 * 4. 两个 mirror 的访问状态分别追踪
 *
 * 写入协议：
 *   beginWrite  → writable: * → UnorderedAccess
 *   (GPU 写入 writable)
 *   endWrite    → writable: UnorderedAccess → CopySource, readable: * → CopyDest
 *                 copy writable → readable
 *                 readable: CopyDest → Common
 *
 * endWrite 只负责录制命令。读取 readable 之前，调用者必须等待提交的命令
 * 执行完成（fence），这一步不在本模块内。
 */

import {
    type BackingBuffer,
    type BackingBufferDescriptor,
    type BackingStoreProvider,
    CapabilityFlags,
    type CommandRecorder,
    type DualBufferChannelConfig,
    LogLevel,
    ResourceState,
    type TransitionBarrier,
} from '@suballoc/types';
import { OffsetHeap } from './offset-heap';
import { BackingStoreError, ProtocolViolationError } from './types';

// ============================================================================
// Types
// ============================================================================

export enum WritePhase {
    /** 从未写入过 */
    Idle = 'idle',
    /** beginWrite 之后、endWrite 之前 */
    Writing = 'writing',
    /** endWrite 已录制，可以读取 readable mirror */
    Readable = 'readable',
}

const DEFAULT_NAME = 'Unnamed DualBufferChannel';

// ============================================================================
// DualBufferChannel
// ============================================================================

export class DualBufferChannel extends OffsetHeap {
    private readonly writable: BackingBuffer;
    private readonly readable: BackingBuffer;

    private writableStateValue: ResourceState = ResourceState.Common;
    private readableStateValue: ResourceState = ResourceState.Common;
    private phaseValue: WritePhase = WritePhase.Idle;

    constructor(provider: BackingStoreProvider, config: DualBufferChannelConfig) {
        const name = config.name ?? DEFAULT_NAME;
        super({
            elementCount: config.elementCount,
            elementSize: config.elementSize,
            alignment: config.alignment ?? config.elementSize,
            name,
            verboseLogging: config.verboseLogging ?? false,
            sink: config.sink,
        });

        this.readable = this.createMirror(provider, {
            label: `Readback mirror of ${name}`,
            byteSize: this.byteSize,
            kind: 'hostReadback',
            capabilityFlags: CapabilityFlags.None,
            initialState: ResourceState.Common,
        });

        try {
            this.writable = this.createMirror(provider, {
                label: `Writable mirror of ${name}`,
                byteSize: this.byteSize,
                kind: 'deviceLocal',
                capabilityFlags: CapabilityFlags.UnorderedAccess,
                initialState: ResourceState.Common,
            });
        } catch (err) {
            this.readable.destroy();
            throw err;
        }

        if (this.readable.mapped === null) {
            this.readable.destroy();
            this.writable.destroy();
            this.logger.force(LogLevel.ERROR, 'Failed to map the resource');
            throw new BackingStoreError(`${name}: readback mirror could not be mapped`);
        }

        this.logger.info(
            `initialized: Size=${Math.floor(this.byteSize / 1024)}KB, ` +
            `ElementSize=${config.elementSize}B, NumElements=${config.elementCount}`
        );
    }

    private createMirror(provider: BackingStoreProvider, descriptor: BackingBufferDescriptor): BackingBuffer {
        try {
            return provider.createBuffer(descriptor);
        } catch (err) {
            const reason = err instanceof Error ? err.message : String(err);
            this.logger.force(LogLevel.ERROR, `Failed to create the resource: ${reason}`);
            throw new BackingStoreError(`${this.name}: failed to create ${descriptor.kind} mirror: ${reason}`, { cause: err });
        }
    }

    // ========================================================================
    // Write Protocol
    // ========================================================================

    get phase(): WritePhase {
        return this.phaseValue;
    }

    get writableState(): ResourceState {
        return this.writableStateValue;
    }

    get readableState(): ResourceState {
        return this.readableStateValue;
    }

    /**
     * 开始 GPU 写入：writable mirror 进入 UnorderedAccess
     *
     * @throws ProtocolViolationError 上一次写入尚未 endWrite
     */
    beginWrite(recorder: CommandRecorder): void {
        this.assertAlive();
        if (this.phaseValue === WritePhase.Writing) {
            throw new ProtocolViolationError(`${this.name}: beginWrite called twice without endWrite`);
        }

        if (this.writableStateValue !== ResourceState.UnorderedAccess) {
            recorder.resourceBarrier([{
                buffer: this.writable,
                before: this.writableStateValue,
                after: ResourceState.UnorderedAccess,
            }]);
            this.writableStateValue = ResourceState.UnorderedAccess;
        }

        this.phaseValue = WritePhase.Writing;
        this.logger.debug('GPU write begin');
    }

    /**
     * 结束 GPU 写入：转换 → 整块拷贝 → 转换
     *
     * recorder 抛出异常时 phase 保持 Writing，可以再次调用 endWrite。
     *
     * @throws ProtocolViolationError 没有先调用 beginWrite
     */
    endWrite(recorder: CommandRecorder): void {
        this.assertAlive();
        if (this.phaseValue !== WritePhase.Writing) {
            throw new ProtocolViolationError(`${this.name}: endWrite called without a matching beginWrite`);
        }

        // 录制失败后重试时，已经转换过的 mirror 不再重复转换
        const toCopy: TransitionBarrier[] = [];
        if (this.writableStateValue !== ResourceState.CopySource) {
            toCopy.push({ buffer: this.writable, before: this.writableStateValue, after: ResourceState.CopySource });
        }
        if (this.readableStateValue !== ResourceState.CopyDest) {
            toCopy.push({ buffer: this.readable, before: this.readableStateValue, after: ResourceState.CopyDest });
        }
        if (toCopy.length > 0) {
            recorder.resourceBarrier(toCopy);
            this.writableStateValue = ResourceState.CopySource;
            this.readableStateValue = ResourceState.CopyDest;
        }

        recorder.copyBufferRegion(this.readable, this.writable, this.byteSize);

        recorder.resourceBarrier([
            { buffer: this.readable, before: ResourceState.CopyDest, after: ResourceState.Common },
        ]);
        this.readableStateValue = ResourceState.Common;

        this.phaseValue = WritePhase.Readable;
        this.logger.debug(`GPU write end, copied ${this.byteSize} bytes to readback mirror`);
    }

    // ========================================================================
    // Addressing
    // ========================================================================

    /**
     * writable mirror 上的设备地址（供 shader 绑定）
     */
    writableDeviceAddress(publicOffset: number): bigint | null {
        return this.addressIn(this.writable, publicOffset);
    }

    /**
     * readable mirror 上的映射视图
     *
     * @param byteLength 默认为分配大小
     * @throws ProtocolViolationError 不在 endWrite 之后的可读窗口内
     */
    readableView(publicOffset: number, byteLength?: number): Uint8Array | null {
        this.assertAlive();
        if (this.phaseValue !== WritePhase.Readable) {
            throw new ProtocolViolationError(
                `${this.name}: readback mirror read while phase is '${this.phaseValue}', expected '${WritePhase.Readable}'`
            );
        }
        return this.viewIn(this.readable, publicOffset, byteLength);
    }

    get writableResource(): BackingBuffer {
        return this.writable;
    }

    get readableResource(): BackingBuffer {
        return this.readable;
    }

    // ========================================================================
    // Lifecycle
    // ========================================================================

    protected releaseBacking(): void {
        if (this.readable.mapped !== null) {
            this.readable.unmap();
        }
        this.readable.destroy();
        this.writable.destroy();
    }
}
