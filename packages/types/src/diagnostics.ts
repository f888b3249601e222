export enum LogLevel {
    NONE = 0,
    ERROR = 1,
    WARN = 2,
    INFO = 3,
    DEBUG = 4,
}

export interface DiagnosticRecord {
    /** 发出日志的模块或堆名 */
    source: string;
    level: LogLevel;
    message: string;
}

/**
 * 诊断输出回调，构造时注入，同步调用
 */
export type DiagnosticSink = (record: DiagnosticRecord) => void;
