/**
 * Memory Pool
 * 
 * 入口模块。
 * 
 * 使用方法：
 * 1. 创建：const heap = new ManagedHeap(provider, { ...HeapPresets.UPLOAD, elementCount, elementSize })
 * 2. 分配：const offset = heap.allocate(size)
 * 3. 访问：heap.mappedView(offset) / heap.deviceAddress(offset)
 * 4. 释放：heap.free(offset)
 */

export * from './types';
export * from './block-table';
export * from './free-size-index';
export * from './suballocator';
export * from './heap-mutex';
export * from './offset-heap';
export * from './managed-heap';
export * from './dual-buffer-channel';
