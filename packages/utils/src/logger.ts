/**
 * Logger Utility
 * 
 * 可配置的日志工具，支持模块前缀和日志级别控制。
 * 各模块实例化自己的 Logger，打印时带上 [module] 前缀。
 * 
 * 输出目标（sink）在构造时注入，不存在进程级的全局日志状态。
 */

import { type DiagnosticRecord, type DiagnosticSink, LogLevel } from '@suballoc/types';

export { LogLevel };

export interface LoggerOptions {
    /** 默认 WARN */
    level?: LogLevel;
    /** 默认输出到 console */
    sink?: DiagnosticSink;
}

/**
 * 默认 sink：按级别转发到 console
 */
export const consoleSink: DiagnosticSink = (record: DiagnosticRecord): void => {
    const prefix = `[${record.source}]`;
    switch (record.level) {
        case LogLevel.ERROR:
            console.error(prefix, record.message);
            break;
        case LogLevel.WARN:
            console.warn(prefix, record.message);
            break;
        case LogLevel.INFO:
            console.info(prefix, record.message);
            break;
        default:
            console.log(prefix, record.message);
    }
};

/**
 * Logger 类
 * 
 * 每个模块实例化自己的 Logger，带上模块名前缀。
 * 
 * @example
 * ```typescript
 * const logger = new Logger('GeometryHeap', { level: LogLevel.DEBUG });
 * logger.debug('Allocated', 256, 'bytes');
 * // 输出: [GeometryHeap] Allocated 256 bytes
 * ```
 */
export class Logger {
    readonly module: string;
    private level: LogLevel;
    private readonly sink: DiagnosticSink;

    constructor(module: string, options: LoggerOptions = {}) {
        this.module = module;
        this.level = options.level ?? LogLevel.WARN;
        this.sink = options.sink ?? consoleSink;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    isEnabled(level: LogLevel): boolean {
        return level !== LogLevel.NONE && this.level >= level;
    }

    /**
     * 不受级别限制的输出，用于必须可见的错误（例如非法释放）
     */
    force(level: LogLevel, ...args: unknown[]): void {
        this.emit(level, args);
    }

    debug(...args: unknown[]): void {
        if (this.isEnabled(LogLevel.DEBUG)) {
            this.emit(LogLevel.DEBUG, args);
        }
    }

    info(...args: unknown[]): void {
        if (this.isEnabled(LogLevel.INFO)) {
            this.emit(LogLevel.INFO, args);
        }
    }

    warn(...args: unknown[]): void {
        if (this.isEnabled(LogLevel.WARN)) {
            this.emit(LogLevel.WARN, args);
        }
    }

    error(...args: unknown[]): void {
        if (this.isEnabled(LogLevel.ERROR)) {
            this.emit(LogLevel.ERROR, args);
        }
    }

    /**
     * sink 抛出的异常不向调用方传播，连同原始记录改为输出到 console。
     */
    private emit(level: LogLevel, args: unknown[]): void {
        const record: DiagnosticRecord = {
            source: this.module,
            level,
            message: args.map(formatArg).join(' '),
        };
        try {
            this.sink(record);
        } catch (err) {
            consoleSink({
                source: this.module,
                level: LogLevel.ERROR,
                message: `Diagnostic sink failed: ${formatArg(err)}`,
            });
            consoleSink(record);
        }
    }
}

function formatArg(arg: unknown): string {
    if (typeof arg === 'string') return arg;
    if (arg instanceof Error) return `${arg.name}: ${arg.message}`;
    if (typeof arg === 'object' && arg !== null) {
        try {
            return JSON.stringify(arg, (_key, value: unknown) =>
                typeof value === 'bigint' ? `${value}n` : value);
        } catch {
            return String(arg);
        }
    }
    return String(arg);
}
