/**
 * 报告输出
 *
 * status=常规输出，note=仅 verbose 输出，warn=总是输出。
 * quiet 模式隐藏逐文件信息，只保留警告与汇总。
 */

export type Verbosity = 'quiet' | 'normal' | 'verbose';

export interface ReportOutput {
    status(line: string): void;
    note(line: string): void;
    warn(line: string): void;
}

export type LineWriter = (line: string) => void;

export class ConsoleReportOutput implements ReportOutput {
    constructor(
        private readonly verbosity: Verbosity,
        private readonly out: LineWriter = (line) => process.stdout.write(`${line}\n`),
        private readonly err: LineWriter = (line) => process.stderr.write(`${line}\n`)
    ) {}

    status(line: string): void {
        if (this.verbosity !== 'quiet') this.out(line);
    }

    note(line: string): void {
        if (this.verbosity === 'verbose') this.out(line);
    }

    warn(line: string): void {
        this.err(line);
    }
}

/** 将输出收集到内存，供测试与库调用方使用 */
export class BufferedReportOutput implements ReportOutput {
    readonly lines: Array<{ channel: 'status' | 'note' | 'warn'; line: string }> = [];

    status(line: string): void {
        this.lines.push({ channel: 'status', line });
    }

    note(line: string): void {
        this.lines.push({ channel: 'note', line });
    }

    warn(line: string): void {
        this.lines.push({ channel: 'warn', line });
    }

    channel(name: 'status' | 'note' | 'warn'): string[] {
        return this.lines.filter(entry => entry.channel === name).map(entry => entry.line);
    }
}
