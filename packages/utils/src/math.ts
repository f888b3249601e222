/**
 * Alignment helpers
 *
 * 所有尺寸与偏移都是非负整数字节数。JS number 在 2^53 以内精确，
 * 足以覆盖任意现实中的 arena 大小。
 */

export function isPowerOfTwo(value: number): boolean {
    return Number.isInteger(value) && value > 0 && (value & (value - 1)) === 0;
}

/**
 * 向上对齐到 alignment 的整数倍
 *
 * alignment 不要求是 2 的幂（元素大小可能是 12、24 之类）。
 */
export function alignUp(size: number, alignment: number): number {
    if (!Number.isSafeInteger(size) || size < 0) {
        throw new RangeError(`alignUp: size must be a non-negative safe integer, got ${size}`);
    }
    if (!Number.isSafeInteger(alignment) || alignment <= 0) {
        throw new RangeError(`alignUp: alignment must be a positive safe integer, got ${alignment}`);
    }
    if (isPowerOfTwo(alignment) && alignment <= 0x40000000) {
        // 2 的幂走位运算快路径，仅在 32 位范围内安全
        if (size <= 0x7fffffff - alignment) {
            return (size + alignment - 1) & ~(alignment - 1);
        }
    }
    return Math.ceil(size / alignment) * alignment;
}

export function isAligned(value: number, alignment: number): boolean {
    return value % alignment === 0;
}
