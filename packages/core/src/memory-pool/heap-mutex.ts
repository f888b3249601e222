/**
 * HeapMutex
 * 
 * 每个堆实例一把互斥锁，保护所有 allocator 操作。
 * 
 * 设计要点：
 * 1. 锁字放在 SharedArrayBuffer 上，CAS (0 → 1) 加锁
 * 2. 堆的簿记结构只存在于当前线程，竞争只可能来自重入
 *    （例如诊断 sink 在分配过程中回调堆）
 * 3. 重入直接抛出 HeapLockError，不自旋
 */

import { HeapLockError } from './types';

// ============================================================================
// Constants
// ============================================================================

const MUTEX_UNLOCKED = 0;
const MUTEX_LOCKED = 1;
const LOCK_SLOT = 0;

// ============================================================================
// HeapMutex
// ============================================================================

export class HeapMutex {
    private readonly owner: string;
    private readonly word: Int32Array;

    constructor(owner: string) {
        this.owner = owner;
        this.word = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
    }

    /**
     * 持锁执行 fn，无论成功与否都会释放
     */
    runExclusive<T>(fn: () => T): T {
        this.acquire();
        try {
            return fn();
        } finally {
            this.release();
        }
    }

    get isLocked(): boolean {
        return Atomics.load(this.word, LOCK_SLOT) === MUTEX_LOCKED;
    }

    private acquire(): void {
        const previous = Atomics.compareExchange(this.word, LOCK_SLOT, MUTEX_UNLOCKED, MUTEX_LOCKED);
        if (previous !== MUTEX_UNLOCKED) {
            throw new HeapLockError(this.owner);
        }
    }

    private release(): void {
        Atomics.store(this.word, LOCK_SLOT, MUTEX_UNLOCKED);
    }
}
