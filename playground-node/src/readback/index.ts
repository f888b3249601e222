/**
 * DualBufferChannel 示例
 * 
 * 使用方法：npm run readback -w @suballoc/playground-node
 * 
 * 模拟一次 GPU 写入 + CPU 回读：
 * beginWrite → 写 writable mirror → endWrite → 读 readable mirror
 */

import { HostBackingProvider, HostCommandRecorder } from '@suballoc/backend-host';
import { DualBufferChannel } from '@suballoc/core';
import { assert, logger } from '../utils';

const provider = new HostBackingProvider();
const recorder = new HostCommandRecorder();

const channel = new DualBufferChannel(provider, {
    elementCount: 256,
    elementSize: 4,
    name: 'Counters',
});

const counters = channel.allocate(16);
logger.log(`counters at ${counters}, device address 0x${channel.writableDeviceAddress(counters)?.toString(16)}`);

// ============================================================================
// GPU 写入
// ============================================================================

logger.logGroup('GPU 写入');

channel.beginWrite(recorder);

// host 后端上 writable mirror 就是一段普通内存，这里直接代替 shader 写入
const writable = provider.buffers.find(buffer => buffer === channel.writableResource);
if (writable === undefined) {
    throw new Error('writable mirror not found');
}
const bytes = writable.contents;
new Uint32Array(bytes.buffer, bytes.byteOffset + counters - 1, 4).set([3, 1, 4, 1]);

channel.endWrite(recorder);

for (const command of recorder.commands) {
    logger.log(JSON.stringify(command));
}

// ============================================================================
// CPU 回读
// ============================================================================

logger.logGroup('CPU 回读');

const view = channel.readableView(counters);
assert(view !== null, 'readable mirror is not mapped');
const values = view === null ? [] : Array.from(new Uint32Array(view.buffer, view.byteOffset, 4));
logger.log(`counters = [${values.join(', ')}]`);

channel.free(counters);
channel.dispose();
logger.success('完成');
