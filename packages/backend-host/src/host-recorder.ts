/**
 * HostCommandRecorder
 * 
 * 立即执行的命令录制器：拷贝直接作用于 HostBuffer.contents，
 * barrier 校验 before 状态与 buffer 当前状态一致。
 * 
 * 所有命令按顺序记录在 commands 中，便于检查录制顺序。
 */

import { type BackingBuffer, type CommandRecorder, ResourceState, type TransitionBarrier } from '@suballoc/types';
import { HostBuffer } from './host-buffer';

// ============================================================================
// Types
// ============================================================================

export interface RecordedTransition {
    label: string;
    before: ResourceState;
    after: ResourceState;
}

export type RecordedCommand =
    | { type: 'barrier'; transitions: RecordedTransition[] }
    | { type: 'uav'; label: string }
    | { type: 'copy'; dst: string; src: string; byteLength: number };

// ============================================================================
// HostCommandRecorder
// ============================================================================

export class HostCommandRecorder implements CommandRecorder {
    readonly commands: RecordedCommand[] = [];

    resourceBarrier(barriers: readonly TransitionBarrier[]): void {
        const resolved = barriers.map(barrier => ({ barrier, buffer: asHostBuffer(barrier.buffer) }));

        // 先整体校验，再整体生效
        for (const { barrier, buffer } of resolved) {
            if (buffer.state !== barrier.before) {
                throw new Error(
                    `${buffer.label}: barrier expects state '${barrier.before}' but buffer is in '${buffer.state}'`
                );
            }
            if (barrier.before === barrier.after) {
                throw new Error(`${buffer.label}: redundant barrier '${barrier.before}' -> '${barrier.after}'`);
            }
        }
        for (const { barrier, buffer } of resolved) {
            buffer.state = barrier.after;
        }

        this.commands.push({
            type: 'barrier',
            transitions: resolved.map(({ barrier, buffer }) => ({
                label: buffer.label,
                before: barrier.before,
                after: barrier.after,
            })),
        });
    }

    uavBarrier(target: BackingBuffer): void {
        const buffer = asHostBuffer(target);
        this.commands.push({ type: 'uav', label: buffer.label });
    }

    copyBufferRegion(dstTarget: BackingBuffer, srcTarget: BackingBuffer, byteLength: number): void {
        const dst = asHostBuffer(dstTarget);
        const src = asHostBuffer(srcTarget);

        if (src.state !== ResourceState.CopySource) {
            throw new Error(`${src.label}: copy source must be in '${ResourceState.CopySource}', is '${src.state}'`);
        }
        if (dst.state !== ResourceState.CopyDest) {
            throw new Error(`${dst.label}: copy destination must be in '${ResourceState.CopyDest}', is '${dst.state}'`);
        }
        if (byteLength > src.byteSize || byteLength > dst.byteSize) {
            throw new RangeError(`copy of ${byteLength} bytes exceeds ${src.label} or ${dst.label}`);
        }

        dst.contents.set(src.contents.subarray(0, byteLength));
        this.commands.push({ type: 'copy', dst: dst.label, src: src.label, byteLength });
    }

    reset(): void {
        this.commands.length = 0;
    }
}

function asHostBuffer(buffer: BackingBuffer): HostBuffer {
    if (!(buffer instanceof HostBuffer)) {
        throw new TypeError(`${buffer.label} was not created by HostBackingProvider`);
    }
    buffer.assertNotDestroyed();
    return buffer;
}
