import { describe, it, expect } from 'vitest';
import { DEVICE_ADDRESS_BASE, HostBackingProvider, HostCommandRecorder } from '@suballoc/backend-host';
import { type BackingBuffer, ResourceState } from '@suballoc/types';
import { DualBufferChannel, WritePhase } from '../dual-buffer-channel';
import { BackingStoreError, NO_ALLOCATION, ProtocolViolationError } from '../types';

const READABLE = 'Readback mirror of Results';
const WRITABLE = 'Writable mirror of Results';

class FailingCopyRecorder extends HostCommandRecorder {
    private failuresLeft: number = 1;

    copyBufferRegion(dst: BackingBuffer, src: BackingBuffer, byteLength: number): void {
        if (this.failuresLeft > 0) {
            this.failuresLeft--;
            throw new Error('device lost');
        }
        super.copyBufferRegion(dst, src, byteLength);
    }
}

const setup = () => {
    const provider = new HostBackingProvider();
    const channel = new DualBufferChannel(provider, {
        elementCount: 64,
        elementSize: 4,
        name: 'Results',
        sink: () => undefined,
    });
    const [readable, writable] = provider.buffers;
    return { provider, channel, readable, writable, recorder: new HostCommandRecorder() };
};

describe('DualBufferChannel', () => {
    it('creates a mapped readback mirror and a device-local writable mirror', () => {
        const { channel, readable, writable } = setup();

        expect(readable.label).toBe(READABLE);
        expect(readable.kind).toBe('hostReadback');
        expect(readable.mapped).not.toBeNull();
        expect(writable.label).toBe(WRITABLE);
        expect(writable.kind).toBe('deviceLocal');
        expect(writable.mapped).toBeNull();
        expect(channel.byteSize).toBe(256);
        expect(channel.phase).toBe(WritePhase.Idle);
    });

    it('shares offsets between the two mirrors', () => {
        const { channel } = setup();
        const a = channel.allocate(16);
        const b = channel.allocate(3);

        expect(a).toBe(1);
        expect(b).toBe(17);
        expect(channel.allocationSize(b)).toBe(4);
        expect(channel.writableDeviceAddress(b)).toBe(DEVICE_ADDRESS_BASE + 65536n + 16n);
        expect(channel.writableDeviceAddress(NO_ALLOCATION)).toBeNull();
    });

    it('records transition, copy, transition on endWrite', () => {
        const { channel, recorder } = setup();

        channel.beginWrite(recorder);
        channel.endWrite(recorder);

        expect(recorder.commands).toEqual([
            {
                type: 'barrier',
                transitions: [{ label: WRITABLE, before: 'common', after: 'unordered-access' }],
            },
            {
                type: 'barrier',
                transitions: [
                    { label: WRITABLE, before: 'unordered-access', after: 'copy-source' },
                    { label: READABLE, before: 'common', after: 'copy-dest' },
                ],
            },
            { type: 'copy', dst: READABLE, src: WRITABLE, byteLength: 256 },
            {
                type: 'barrier',
                transitions: [{ label: READABLE, before: 'copy-dest', after: 'common' }],
            },
        ]);
        expect(channel.phase).toBe(WritePhase.Readable);
        expect(channel.writableState).toBe(ResourceState.CopySource);
        expect(channel.readableState).toBe(ResourceState.Common);
    });

    it('exposes what the device wrote through the readable view', () => {
        const { channel, writable, recorder } = setup();
        const offset = channel.allocate(8);
        const other = channel.allocate(8);

        channel.beginWrite(recorder);
        writable.contents.set([1, 2, 3, 4, 5, 6, 7, 8], offset - 1);
        writable.contents.set([9, 9], other - 1);
        channel.endWrite(recorder);

        expect(Array.from(channel.readableView(offset) ?? [])).toEqual([1, 2, 3, 4, 5, 6, 7, 8]);
        expect(Array.from(channel.readableView(other, 2) ?? [])).toEqual([9, 9]);
        expect(channel.readableView(NO_ALLOCATION)).toBeNull();
    });

    it('goes back to unordered access on the next write', () => {
        const { channel, recorder } = setup();
        channel.beginWrite(recorder);
        channel.endWrite(recorder);
        recorder.reset();

        channel.beginWrite(recorder);

        expect(recorder.commands).toEqual([{
            type: 'barrier',
            transitions: [{ label: WRITABLE, before: 'copy-source', after: 'unordered-access' }],
        }]);
        expect(channel.phase).toBe(WritePhase.Writing);
    });

    it('can finish endWrite after a failed copy', () => {
        const { channel } = setup();
        const recorder = new FailingCopyRecorder();

        channel.beginWrite(recorder);
        expect(() => channel.endWrite(recorder)).toThrow('device lost');
        expect(channel.phase).toBe(WritePhase.Writing);
        expect(channel.writableState).toBe(ResourceState.CopySource);
        expect(channel.readableState).toBe(ResourceState.CopyDest);

        channel.endWrite(recorder);

        expect(recorder.commands.slice(2)).toEqual([
            { type: 'copy', dst: READABLE, src: WRITABLE, byteLength: 256 },
            {
                type: 'barrier',
                transitions: [{ label: READABLE, before: 'copy-dest', after: 'common' }],
            },
        ]);
        expect(recorder.commands).toHaveLength(4);
        expect(channel.phase).toBe(WritePhase.Readable);
    });

    describe('Protocol violations', () => {
        it('rejects endWrite without beginWrite', () => {
            const { channel, recorder } = setup();
            expect(() => channel.endWrite(recorder)).toThrow(ProtocolViolationError);
            expect(recorder.commands).toHaveLength(0);
        });

        it('rejects a second beginWrite', () => {
            const { channel, recorder } = setup();
            channel.beginWrite(recorder);
            expect(() => channel.beginWrite(recorder)).toThrow('Results: beginWrite called twice without endWrite');
        });

        it('rejects reads outside the readable window', () => {
            const { channel, recorder } = setup();
            const offset = channel.allocate(4);

            expect(() => channel.readableView(offset)).toThrow(
                "Results: readback mirror read while phase is 'idle', expected 'readable'"
            );
            channel.beginWrite(recorder);
            expect(() => channel.readableView(offset)).toThrow(ProtocolViolationError);
        });
    });

    describe('Initialization failures', () => {
        it('releases the readable mirror when the writable one fails', () => {
            const provider = new HostBackingProvider({
                failOn: d => d.kind === 'deviceLocal' ? 'out of device memory' : undefined,
            });

            expect(() => new DualBufferChannel(provider, {
                elementCount: 16,
                elementSize: 4,
                name: 'Results',
                sink: () => undefined,
            })).toThrow('Results: failed to create deviceLocal mirror: out of device memory');
            expect(provider.buffers).toHaveLength(1);
            expect(provider.liveBufferCount).toBe(0);
        });

        it('fails when the readable mirror is not mapped', () => {
            const provider = new HostBackingProvider({ unmappableKinds: ['hostReadback'] });

            expect(() => new DualBufferChannel(provider, {
                elementCount: 16,
                elementSize: 4,
                sink: () => undefined,
            })).toThrow(BackingStoreError);
            expect(provider.liveBufferCount).toBe(0);
        });
    });

    it('releases both mirrors on dispose', () => {
        const { provider, channel } = setup();
        channel.dispose();
        expect(provider.liveBufferCount).toBe(0);
        expect(channel.isDisposed).toBe(true);
    });
});
