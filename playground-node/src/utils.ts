/**
 * Playground 工具函数
 */

import type { HeapAllocationStats } from '@suballoc/types';

// ============================================================================
// 日志工具
// ============================================================================

export const logger = {
    log: console.log,
    logGroup: (msg: string) => console.log(`\n=== ${msg} ===`),
    success: (msg: string) => console.log(`\x1b[32m${msg}\x1b[0m`), // 绿色
    error: console.error,
};

/** 断言函数 */
export function assert(condition: boolean, msg: string): void {
    if (!condition) {
        logger.error(`断言失败: ${msg}`);
        throw new Error(msg);
    }
}

export function formatStats(stats: HeapAllocationStats): string {
    return [
        `used ${stats.usedSize}/${stats.totalSize} B`,
        `${stats.numAllocations} allocations`,
        `${stats.numFreeBlocks} free blocks`,
        `largest free ${stats.largestFreeBlock} B`,
        `fragmentation ${stats.fragmentationRatio.toFixed(3)}`,
    ].join(', ');
}
