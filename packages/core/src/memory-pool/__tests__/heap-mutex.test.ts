import { afterEach, describe, it, expect, vi } from 'vitest';
import { HostBackingProvider } from '@suballoc/backend-host';
import type { DiagnosticRecord } from '@suballoc/types';
import { HeapMutex } from '../heap-mutex';
import { ManagedHeap } from '../managed-heap';
import { HeapLockError, HeapPresets } from '../types';

describe('HeapMutex', () => {
    it('holds the lock only while the callback runs', () => {
        const mutex = new HeapMutex('Test');
        let insideLocked = false;

        const result = mutex.runExclusive(() => {
            insideLocked = mutex.isLocked;
            return 42;
        });

        expect(result).toBe(42);
        expect(insideLocked).toBe(true);
        expect(mutex.isLocked).toBe(false);
    });

    it('releases the lock when the callback throws', () => {
        const mutex = new HeapMutex('Test');
        expect(() => mutex.runExclusive(() => {
            throw new Error('boom');
        })).toThrow('boom');
        expect(mutex.isLocked).toBe(false);
    });

    it('rejects re-entrant acquisition', () => {
        const mutex = new HeapMutex('Test');
        expect(() => mutex.runExclusive(() => mutex.runExclusive(() => 1))).toThrow(HeapLockError);
        expect(mutex.isLocked).toBe(false);
    });

    it('rejects a diagnostic sink that calls back into its heap', () => {
        const errors: unknown[] = [];
        let heap: ManagedHeap | undefined;

        const sink = (record: DiagnosticRecord): void => {
            if (!record.message.startsWith('Allocated')) return;
            try {
                heap?.getStats();
            } catch (err) {
                errors.push(err);
            }
        };

        heap = new ManagedHeap(new HostBackingProvider(), {
            ...HeapPresets.UPLOAD,
            elementCount: 256,
            elementSize: 1,
            name: 'Reentrant',
            verboseLogging: true,
            sink,
        });

        expect(heap.allocate(16)).toBe(1);
        expect(errors).toHaveLength(1);
        expect(errors[0]).toBeInstanceOf(HeapLockError);
        expect(heap.getStats().numAllocations).toBe(1);
    });

    describe('Throwing sink', () => {
        afterEach(() => {
            vi.restoreAllMocks();
        });

        it('leaves the heap usable when a re-entrant sink throws', () => {
            const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
            vi.spyOn(console, 'log').mockImplementation(() => undefined);
            let heap: ManagedHeap | undefined;

            const sink = (record: DiagnosticRecord): void => {
                if (record.message.startsWith('Allocated') || record.message.startsWith('Freed')) {
                    heap?.getStats();
                }
            };

            heap = new ManagedHeap(new HostBackingProvider(), {
                ...HeapPresets.UPLOAD,
                elementCount: 256,
                elementSize: 1,
                name: 'Throwing',
                verboseLogging: true,
                sink,
            });

            const a = heap.allocate(16);
            expect(a).toBe(1);
            expect(heap.getStats().numAllocations).toBe(1);

            heap.free(a);
            expect(heap.getStats()).toMatchObject({
                usedSize: 0,
                numAllocations: 0,
                numFreeBlocks: 1,
                largestFreeBlock: 256,
            });
            expect(heap.allocate(256)).toBe(1);

            expect(consoleError).toHaveBeenCalledWith(
                '[Throwing]',
                'Diagnostic sink failed: HeapLockError: Throwing: lock is already held (re-entrant heap access)'
            );
        });
    });
});
