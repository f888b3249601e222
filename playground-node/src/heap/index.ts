/**
 * ManagedHeap 示例
 * 
 * 使用方法：npm run heap -w @suballoc/playground-node
 * 
 * 工作流程：
 * 1. 创建 1KB 的上传堆
 * 2. 分配 100 / 200 字节，释放第一块
 * 3. 分配 50 字节，确认复用了最小的空闲 block
 * 4. 全部释放，确认合并回一个 block
 */

import { HostBackingProvider } from '@suballoc/backend-host';
import { HeapPresets, ManagedHeap, OutOfSpaceError } from '@suballoc/core';
import { LogLevel } from '@suballoc/types';
import { consoleSink } from '@suballoc/utils';
import { assert, formatStats, logger } from '../utils';

const provider = new HostBackingProvider();

const heap = new ManagedHeap(provider, {
    ...HeapPresets.UPLOAD,
    elementCount: 1024,
    elementSize: 1,
    name: 'PlaygroundHeap',
    verboseLogging: process.argv.includes('--verbose'),
    sink: record => {
        if (record.level !== LogLevel.DEBUG) consoleSink(record);
    },
});

// ============================================================================
// 步骤 1: 分配
// ============================================================================

logger.logGroup('步骤 1: 分配');

const a = heap.allocate(100);
const b = heap.allocate(200);
logger.log(`a=${a} (address 0x${heap.deviceAddress(a)?.toString(16)}), b=${b}`);
logger.log(formatStats(heap.getStats()));

heap.mappedView(b)?.fill(0xab);

// ============================================================================
// 步骤 2: 释放并复用
// ============================================================================

logger.logGroup('步骤 2: 释放并复用');

heap.free(a);
const c = heap.allocate(50);
assert(c === a, `expected the freed region at ${a} to be reused, got ${c}`);
logger.log(`c=${c}`);
logger.log(formatStats(heap.getStats()));

// ============================================================================
// 步骤 3: 空间不足
// ============================================================================

logger.logGroup('步骤 3: 空间不足');

try {
    heap.allocate(2048);
} catch (err) {
    if (!(err instanceof OutOfSpaceError)) throw err;
    logger.log(`requested ${err.requestedSize} B, largest free block ${err.largestFreeBlock} B`);
}

// ============================================================================
// 步骤 4: 全部释放
// ============================================================================

logger.logGroup('步骤 4: 全部释放');

heap.free(c);
heap.free(b);
const stats = heap.getStats();
logger.log(formatStats(stats));
assert(stats.usedSize === 0 && stats.numFreeBlocks === 1, 'heap did not coalesce back into one block');

heap.dispose();
logger.success('完成');
