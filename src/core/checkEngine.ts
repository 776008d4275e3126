/**
 * 检查引擎
 *
 * 串联候选过滤、行扫描 / diff 分类、报告汇总与修复：
 * - checkCandidates: 全文模式，逐文件扫描所有行
 * - checkChange: diff 模式，只检查新增行；仅适用于恰好一个父提交的变更
 * - fixCandidates: 按文件逐个修复并写回，失败即中止，已写入的不回滚
 *
 * 文件按顺序逐个处理完毕后才处理下一个。
 */

import type { Candidate, ContentWriter } from '../types/candidate';
import type { Policy } from '../types/policy';
import type { FileReport } from '../types/violation';
import type { ReportOutput } from '../utils/reportOutput';
import { CandidateFilter } from '../shared/candidateFilter';
import { scanContent, summarizeKinds } from '../shared/fileReport';
import { fixContent, needsFix } from '../shared/fixer';
import { tokenizeUnifiedDiff } from '../utils/diffParser';
import { Logger } from '../utils/logger';
import { classifyDiffTokens, collectDiffPaths } from './diffClassifier';
import { ReportAggregator, type RunOutcome } from './reportAggregator';

/** diff 模式的输入：父提交列表、unified diff 文本、按路径取候选 */
export interface ChangeDiff {
    parents: readonly string[];
    diff: string;
    candidateFor(filePath: string): Candidate;
}

export interface CheckResult extends RunOutcome {
    reports: FileReport[];
    /** diff 模式下父提交数不为 1 时整体跳过 */
    skipped: boolean;
}

export interface FixOutcome {
    /** 实际写回的文件 */
    fixed: string[];
    /** 修复后仍有违规的文件（如 tabs 模式下不足一个 tab 宽度的空格缩进） */
    remaining: string[];
}

export class CheckEngine {
    private readonly filter: CandidateFilter;
    private readonly logger = new Logger('CheckEngine');

    constructor(
        private readonly policy: Policy,
        private readonly output: ReportOutput
    ) {
        this.filter = new CandidateFilter(policy);
    }

    async checkCandidates(candidates: readonly Candidate[], target: string): Promise<CheckResult> {
        const aggregator = new ReportAggregator(this.output);
        const reports: FileReport[] = [];

        for (const candidate of candidates) {
            const relevance = await this.filter.evaluate(candidate);
            if (!relevance.relevant) {
                continue;
            }
            this.logger.debug(`checking ${candidate.path} ...`);
            const report = scanContent(candidate.path, relevance.content, this.policy);
            aggregator.recordReport(report, this.policy.indentMode);
            reports.push(report);
        }

        return { ...aggregator.finalize(target), reports, skipped: false };
    }

    async checkChange(change: ChangeDiff, target: string): Promise<CheckResult> {
        const aggregator = new ReportAggregator(this.output);

        if (change.parents.length !== 1) {
            this.output.status(`${target}: skipped (${change.parents.length} parents, diff check needs exactly one)`);
            return { ...aggregator.finalize(target), reports: [], skipped: true };
        }

        const tokens = tokenizeUnifiedDiff(change.diff);
        const relevant = new Set<string>();
        for (const filePath of collectDiffPaths(tokens)) {
            if (await this.filter.isRelevant(change.candidateFor(filePath))) {
                relevant.add(filePath);
            }
        }
        this.logger.debug(`diff: ${tokens.length} tokens, ${relevant.size} relevant file(s)`);

        const reports = classifyDiffTokens(tokens, {
            policy: this.policy,
            isRelevant: filePath => relevant.has(filePath),
        });
        for (const report of reports) {
            aggregator.recordReport(report, this.policy.indentMode);
        }

        return { ...aggregator.finalize(target), reports, skipped: false };
    }

    /**
     * 修复相关且存在违规的文件；修复后的内容会再检查一次，仍有违规的文件计入 remaining
     */
    async fixCandidates(candidates: readonly Candidate[], writer: ContentWriter): Promise<FixOutcome> {
        const outcome: FixOutcome = { fixed: [], remaining: [] };
        for (const candidate of candidates) {
            const relevance = await this.filter.evaluate(candidate);
            if (!relevance.relevant || !needsFix(relevance.content, this.policy)) {
                continue;
            }
            const content = fixContent(relevance.content, this.policy);
            if (content === relevance.content) {
                this.logger.debug(`${candidate.path}: 修复后内容无变化，跳过写入`);
            } else {
                this.output.status(`fixing ${candidate.path}`);
                await writer.write(candidate.path, content);
                outcome.fixed.push(candidate.path);
            }
            if (needsFix(content, this.policy)) {
                const report = scanContent(candidate.path, content, this.policy);
                this.output.status(`${candidate.path}: not fully fixed (${summarizeKinds(report, this.policy.indentMode)})`);
                outcome.remaining.push(candidate.path);
            }
        }
        return outcome;
    }
}
