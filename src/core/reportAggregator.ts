/**
 * 报告汇总
 *
 * 只做累加：逐文件记录结果与问题数，最后产出 RunReport 与一行汇总警告。
 * 同一次运行中同一文件只能记录一次。
 */

import type { IndentMode } from '../types/policy';
import type { FileReport, RunReport } from '../types/violation';
import type { ReportOutput } from '../utils/reportOutput';
import { describeKind, summarizeKinds } from '../shared/fileReport';

export interface RunOutcome extends RunReport {
    /** 是否发现问题：调用方据此决定退出码 / 是否阻止提交 */
    hadIssues: boolean;
}

export class ReportAggregator {
    private readonly recorded = new Set<string>();
    private filesWithIssues = 0;
    private totalIssues = 0;

    constructor(private readonly output: ReportOutput) {}

    recordFile(filePath: string, hadViolations: boolean, summaryLabel: string): void {
        if (this.recorded.has(filePath)) {
            throw new Error(`文件重复记录: ${filePath}`);
        }
        this.recorded.add(filePath);
        if (hadViolations) {
            this.filesWithIssues++;
            this.output.status(`${filePath}: ${summaryLabel}`);
        } else {
            this.output.note(`${filePath}: ${summaryLabel}`);
        }
    }

    recordViolationCount(count: number): void {
        this.totalIssues += count;
    }

    /**
     * 输出一个文件的逐条违规、文件摘要，并计入总数
     */
    recordReport(report: FileReport, indentMode: IndentMode): void {
        for (const violation of report.violations) {
            const location = violation.line !== undefined ? String(violation.line) : (violation.hunk ?? '?');
            this.output.status(`${violation.file} (${location}): ${describeKind(violation.kind, indentMode)}`);
            if (violation.detail) {
                this.output.note(`  ${violation.detail.text}`);
                this.output.note(`  ${violation.detail.pointer}`);
            }
        }
        this.recordViolationCount(report.violations.length);
        this.recordFile(report.file, !report.ok, summarizeKinds(report, indentMode));
    }

    /**
     * @param target - 版本标识，或 'working directory' / 'staged changes'
     */
    finalize(target: string): RunOutcome {
        const hadIssues = this.filesWithIssues > 0;
        if (hadIssues) {
            this.output.warn(`${this.totalIssues} issue(s) found in ${this.filesWithIssues} file(s) in ${target}.`);
        }
        return {
            filesWithIssues: this.filesWithIssues,
            totalIssues: this.totalIssues,
            hadIssues,
        };
    }
}
