import { describe, it, expect } from 'vitest';
import { DEVICE_ADDRESS_BASE, HostBackingProvider, HostCommandRecorder } from '@suballoc/backend-host';
import { CapabilityFlags, type DiagnosticRecord, LogLevel, ResourceState } from '@suballoc/types';
import { ManagedHeap } from '../managed-heap';
import { BackingStoreError, HeapError, HeapPresets, NO_ALLOCATION, OutOfSpaceError } from '../types';

const collect = () => {
    const records: DiagnosticRecord[] = [];
    return { records, sink: (record: DiagnosticRecord) => records.push(record) };
};

describe('ManagedHeap', () => {
    describe('Initialization', () => {
        it('creates one mapped buffer for host-visible kinds', () => {
            const { records, sink } = collect();
            const provider = new HostBackingProvider();
            const heap = new ManagedHeap(provider, {
                ...HeapPresets.UPLOAD,
                elementCount: 1024,
                elementSize: 4,
                name: 'Upload',
                sink,
            });

            expect(provider.buffers).toHaveLength(1);
            expect(heap.resource.label).toBe('Buffer managed by Upload (hostUpload)');
            expect(heap.resource.byteSize).toBe(4096);
            expect(heap.resource.mapped).not.toBeNull();
            expect(heap.currentState).toBe(ResourceState.GenericRead);
            expect(records).toEqual([{
                source: 'Upload',
                level: LogLevel.INFO,
                message: 'initialized: Type=hostUpload, Size=4KB, ElementSize=4B, NumElements=1024',
            }]);
        });

        it('fails when the provider has no device upload heap', () => {
            const { records, sink } = collect();
            const provider = new HostBackingProvider();

            expect(() => new ManagedHeap(provider, {
                ...HeapPresets.DEVICE_UPLOAD,
                elementCount: 64,
                elementSize: 1,
                sink,
            })).toThrow(BackingStoreError);

            expect(provider.buffers).toHaveLength(0);
            expect(records).toEqual([{
                source: 'Unnamed ManagedHeap',
                level: LogLevel.ERROR,
                message: 'GPU upload heap not supported',
            }]);
        });

        it('accepts device upload heaps when supported', () => {
            const provider = new HostBackingProvider({ features: { gpuUploadHeap: true } });
            const heap = new ManagedHeap(provider, {
                ...HeapPresets.DEVICE_UPLOAD,
                elementCount: 64,
                elementSize: 1,
                sink: () => undefined,
            });
            expect(heap.mappedView(heap.allocate(8))).toHaveLength(8);
        });

        it('fails and releases the buffer when a host-visible buffer is not mapped', () => {
            const provider = new HostBackingProvider({ unmappableKinds: ['hostReadback'] });

            expect(() => new ManagedHeap(provider, {
                ...HeapPresets.READBACK,
                elementCount: 64,
                elementSize: 1,
                name: 'Readback',
                sink: () => undefined,
            })).toThrow("Readback: host-visible buffer of kind 'hostReadback' could not be mapped");

            expect(provider.buffers).toHaveLength(1);
            expect(provider.liveBufferCount).toBe(0);
        });

        it('wraps provider failures with their cause', () => {
            const provider = new HostBackingProvider({ failOn: () => 'device lost' });
            let caught: unknown;
            try {
                new ManagedHeap(provider, {
                    ...HeapPresets.STORAGE,
                    elementCount: 64,
                    elementSize: 1,
                    name: 'Storage',
                    sink: () => undefined,
                });
            } catch (err) {
                caught = err;
            }

            expect(caught).toBeInstanceOf(BackingStoreError);
            if (caught instanceof BackingStoreError) {
                expect(caught.message).toBe('Storage: failed to create backing buffer: device lost');
                expect(caught.cause).toBeInstanceOf(Error);
            }
        });
    });

    describe('Offsets', () => {
        const upload = () => new ManagedHeap(new HostBackingProvider(), {
            ...HeapPresets.UPLOAD,
            elementCount: 1024,
            elementSize: 1,
            name: 'Upload',
            sink: () => undefined,
        });

        it('never hands out the sentinel', () => {
            const heap = upload();
            const a = heap.allocate(100);
            const b = heap.allocate(200);

            expect(a).toBe(1);
            expect(b).toBe(101);
            expect(heap.allocationSize(b)).toBe(200);
            expect(heap.allocationSize(NO_ALLOCATION)).toBeUndefined();
        });

        it('treats freeing the sentinel as a no-op', () => {
            const heap = upload();
            heap.allocate(10);
            const before = heap.getStats();

            heap.free(NO_ALLOCATION);

            expect(heap.getStats()).toEqual(before);
        });

        it('reuses freed space with the same public offset', () => {
            const heap = upload();
            const a = heap.allocate(100);
            heap.allocate(200);
            heap.free(a);

            expect(heap.allocate(50)).toBe(1);
        });

        it('maps offsets to device addresses', () => {
            const heap = upload();
            const a = heap.allocate(100);
            const b = heap.allocate(200);

            expect(heap.deviceAddress(a)).toBe(DEVICE_ADDRESS_BASE);
            expect(heap.deviceAddress(b)).toBe(DEVICE_ADDRESS_BASE + 100n);
            expect(heap.deviceAddress(NO_ALLOCATION)).toBeNull();
        });

        it('maps offsets to views of the buffer', () => {
            const heap = upload();
            heap.allocate(100);
            const b = heap.allocate(200);

            const view = heap.mappedView(b);
            expect(view).toHaveLength(200);
            view?.fill(7);

            expect(heap.resource.mapped?.[99]).toBe(0);
            expect(heap.resource.mapped?.[100]).toBe(7);
            expect(heap.resource.mapped?.[299]).toBe(7);
            expect(heap.resource.mapped?.[300]).toBe(0);

            expect(heap.mappedView(NO_ALLOCATION)).toBeNull();
            expect(heap.mappedView(b, 16)).toHaveLength(16);
            expect(() => heap.mappedView(b, 1000)).toThrow(RangeError);
            expect(() => heap.mappedView(50)).toThrow('Upload: no live allocation at offset 50');
        });

        it('rejects offsets that are not integers', () => {
            const heap = upload();
            heap.allocate(16);

            expect(() => heap.deviceAddress(1.5)).toThrow('Upload: offset 1.5 is not an integer');
            expect(() => heap.mappedView(1.5)).toThrow('Upload: offset 1.5 is not an integer');
            expect(() => heap.deviceAddress(Number.NaN)).toThrow(RangeError);
        });

        it('has no views into device-local memory', () => {
            const heap = new ManagedHeap(new HostBackingProvider(), {
                ...HeapPresets.STORAGE,
                elementCount: 64,
                elementSize: 1,
                sink: () => undefined,
            });
            const a = heap.allocate(8);
            expect(heap.mappedView(a)).toBeNull();
            expect(heap.deviceAddress(a)).toBe(DEVICE_ADDRESS_BASE);
        });

        it('surfaces exhaustion to the caller', () => {
            const heap = upload();
            expect(() => heap.allocate(2000)).toThrow(OutOfSpaceError);
            expect(heap.getStats().numAllocations).toBe(0);
        });
    });

    describe('State transitions', () => {
        const storage = () => new ManagedHeap(new HostBackingProvider(), {
            ...HeapPresets.STORAGE,
            elementCount: 64,
            elementSize: 1,
            name: 'Storage',
            sink: () => undefined,
        });

        it('records nothing when the state already matches', () => {
            const heap = storage();
            const recorder = new HostCommandRecorder();

            heap.transitionTo(recorder, ResourceState.Common);

            expect(recorder.commands).toHaveLength(0);
        });

        it('records one barrier per change', () => {
            const heap = storage();
            const recorder = new HostCommandRecorder();

            heap.transitionTo(recorder, ResourceState.UnorderedAccess);
            heap.transitionTo(recorder, ResourceState.CopySource);

            expect(heap.currentState).toBe(ResourceState.CopySource);
            expect(recorder.commands).toEqual([
                {
                    type: 'barrier',
                    transitions: [{ label: 'Buffer managed by Storage (deviceLocal)', before: 'common', after: 'unordered-access' }],
                },
                {
                    type: 'barrier',
                    transitions: [{ label: 'Buffer managed by Storage (deviceLocal)', before: 'unordered-access', after: 'copy-source' }],
                },
            ]);
        });

        it('records uav barriers', () => {
            const heap = storage();
            const recorder = new HostCommandRecorder();
            heap.uavBarrier(recorder);
            expect(recorder.commands).toEqual([{ type: 'uav', label: 'Buffer managed by Storage (deviceLocal)' }]);
        });
    });

    describe('Write tracking', () => {
        it('is enabled for upload kinds when the provider supports it', () => {
            const { records, sink } = collect();
            const provider = new HostBackingProvider({ features: { manualWriteTracking: true } });
            const heap = new ManagedHeap(provider, {
                ...HeapPresets.UPLOAD,
                elementCount: 64,
                elementSize: 1,
                name: 'Tracked',
                verboseLogging: true,
                sink,
            });

            expect(heap.isWriteTrackingEnabled).toBe(true);
            expect(heap.capabilityFlags & CapabilityFlags.ManualWriteTracking).toBe(CapabilityFlags.ManualWriteTracking);

            heap.trackWrite({ begin: 0, end: 16 });

            expect(provider.buffers[0].writtenRanges).toEqual([{ begin: 0, end: 16 }]);
            expect(records[records.length - 1].message).toBe('TrackWrite: Range [0, 16]');
        });

        it('is a no-op for other kinds', () => {
            const provider = new HostBackingProvider({ features: { manualWriteTracking: true } });
            const heap = new ManagedHeap(provider, {
                ...HeapPresets.STORAGE,
                elementCount: 64,
                elementSize: 1,
                sink: () => undefined,
            });

            heap.trackWrite({ begin: 0, end: 16 });

            expect(heap.isWriteTrackingEnabled).toBe(false);
            expect(provider.buffers[0].writtenRanges).toEqual([]);
        });
    });

    describe('Dispose', () => {
        it('reports leaks, releases the buffer and refuses further use', () => {
            const { records, sink } = collect();
            const provider = new HostBackingProvider();
            const heap = new ManagedHeap(provider, {
                ...HeapPresets.UPLOAD,
                elementCount: 64,
                elementSize: 1,
                name: 'Disposable',
                sink,
            });
            heap.allocate(8);

            heap.dispose();
            heap.dispose();

            expect(heap.isDisposed).toBe(true);
            expect(provider.liveBufferCount).toBe(0);
            expect(records.slice(1).map(r => r.message)).toEqual([
                'Warning - there are still 1 allocations',
                'Allocation - offset=0, size=8',
            ]);
            expect(() => heap.allocate(8)).toThrow(HeapError);
            expect(() => heap.allocate(8)).toThrow('Disposable has been disposed');
        });
    });
});
