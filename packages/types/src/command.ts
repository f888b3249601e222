import type { BackingBuffer, ResourceState } from './backing';

/**
 * 一次状态转换
 */
export interface TransitionBarrier {
    buffer: BackingBuffer;
    before: ResourceState;
    after: ResourceState;
}

/**
 * 命令录制上下文
 *
 * 对应一条 command list。堆只负责按正确顺序录制命令，
 * 提交与完成信号（fence）由外部负责。
 */
export interface CommandRecorder {
    /** 录制一批状态转换，同批次内的 barrier 视为同时生效 */
    resourceBarrier(barriers: readonly TransitionBarrier[]): void;
    /** 录制 UAV barrier：保证之前的 UAV 写入对之后的访问可见 */
    uavBarrier(buffer: BackingBuffer): void;
    /** 整块拷贝 src → dst */
    copyBufferRegion(dst: BackingBuffer, src: BackingBuffer, byteLength: number): void;
}
