/**
 * 日志模块：所有 Logger 实例共享同一输出 sink（单例，默认 stderr），供各模块打点与排查问题。
 *
 * 报告正文不走 Logger，见 utils/reportOutput.ts。
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** 输出目标：接收一整行（不含换行） */
export type LogSink = (line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

const stderrSink: LogSink = (line) => {
    process.stderr.write(`${line}\n`);
};

let sharedSink: LogSink = stderrSink;
let threshold: LogLevel = 'warn';

export class Logger {
    /** 替换共享 sink（测试中用于捕获输出） */
    static setSink = (sink: LogSink): void => {
        sharedSink = sink;
    };

    static resetSink = (): void => {
        sharedSink = stderrSink;
    };

    /** 设置全局最低输出级别，由 CLI 的 --debug / --verbose 决定 */
    static setLevel = (level: LogLevel): void => {
        threshold = level;
    };

    static getLevel = (): LogLevel => threshold;

    private prefix: string;

    constructor(prefix: string = 'wscheck') {
        this.prefix = prefix === 'wscheck' ? prefix : `wscheck:${prefix}`;
    }

    private emit(level: LogLevel | 'important', message: string, args: unknown[]): void {
        if (level !== 'important' && LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
            return;
        }
        sharedSink(`[${this.prefix}] [${level.toUpperCase()}] ${message}`);
        if (args.length > 0) sharedSink(JSON.stringify(args, null, 2));
    }

    info(message: string, ...args: unknown[]): void {
        this.emit('info', message, args);
    }

    /** 不受级别限制 */
    important(message: string, ...args: unknown[]): void {
        this.emit('important', message, args);
    }

    debug(message: string, ...args: unknown[]): void {
        this.emit('debug', message, args);
    }

    warn(message: string, ...args: unknown[]): void {
        this.emit('warn', message, args);
    }

    error(message: string, error?: unknown): void {
        if (LEVEL_ORDER.error < LEVEL_ORDER[threshold]) {
            return;
        }
        sharedSink(`[${this.prefix}] [ERROR] ${message}`);
        if (error != null) {
            sharedSink(error instanceof Error ? (error.stack ?? error.message) : String(error));
        }
    }
}
