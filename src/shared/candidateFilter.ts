/**
 * 候选文件过滤
 *
 * 判定顺序固定：显式忽略路径 > 忽略后缀 > 检查后缀（需命中其一）> 文件不存在 > 二进制。
 * 任何一关不通过的文件都不会进入扫描或修复。
 *
 * 二进制判定沿用"内容含 NUL 字节"的启发式；文件不存在通过读取器抛出
 * ContentMissingError 识别。二者都是经验规则，不保证准确。
 */

import * as path from 'path';
import { minimatch } from 'minimatch';
import type { Candidate } from '../types/candidate';
import type { Policy } from '../types/policy';
import { ContentMissingError, ContentReadError, NotRegularFileError, WsCheckError } from '../utils/errors';
import { Logger } from '../utils/logger';

export type ExclusionReason =
    | 'ignored_path'
    | 'ignored_suffix'
    | 'unchecked_suffix'
    | 'missing'
    | 'not_a_file'
    | 'binary';

export type Relevance =
    | { relevant: true; content: string }
    | { relevant: false; reason: ExclusionReason };

const GLOB_CHARS = /[*?[\]{]/;

const normalizePath = (filePath: string): string => filePath.replace(/\\/g, '/');

const EXCLUSION_MESSAGES: Record<ExclusionReason, string> = {
    ignored_path: 'explicit ignore',
    ignored_suffix: 'ignored extension',
    unchecked_suffix: 'non-checked extension',
    missing: 'deleted',
    not_a_file: 'not a regular file',
    binary: 'binary',
};

export class CandidateFilter {
    private readonly exactIgnores: ReadonlySet<string>;
    private readonly globIgnores: readonly string[];
    private readonly checkedSuffixes: readonly string[];
    private readonly ignoredSuffixes: readonly string[];
    private readonly cache = new WeakMap<Candidate, Promise<Relevance>>();
    private readonly logger = new Logger('CandidateFilter');

    constructor(policy: Policy) {
        const exact = new Set<string>();
        const globs: string[] = [];
        for (const entry of policy.ignoredPaths) {
            const normalized = normalizePath(entry.trim());
            if (!normalized) continue;
            if (GLOB_CHARS.test(normalized)) {
                globs.push(normalized);
            } else {
                exact.add(normalized);
            }
        }
        this.exactIgnores = exact;
        this.globIgnores = globs;
        this.checkedSuffixes = [...policy.checkedSuffixes];
        this.ignoredSuffixes = [...policy.ignoredSuffixes];
    }

    /**
     * 只看路径的前三关（不读内容）
     * @returns 命中的排除原因；全部通过返回 null
     */
    checkPath(filePath: string): ExclusionReason | null {
        const normalized = normalizePath(filePath);
        if (this.exactIgnores.has(normalized) || this.matchesIgnoreGlob(normalized)) {
            return 'ignored_path';
        }
        if (this.ignoredSuffixes.some(suffix => normalized.endsWith(suffix))) {
            return 'ignored_suffix';
        }
        if (this.checkedSuffixes.length > 0 && !this.checkedSuffixes.some(suffix => normalized.endsWith(suffix))) {
            return 'unchecked_suffix';
        }
        return null;
    }

    /**
     * 完整判定；同一个候选对象只读取一次内容，结果缓存供扫描与修复复用
     */
    evaluate(candidate: Candidate): Promise<Relevance> {
        const cached = this.cache.get(candidate);
        if (cached) {
            return cached;
        }
        const pending = this.evaluateUncached(candidate);
        this.cache.set(candidate, pending);
        return pending;
    }

    async isRelevant(candidate: Candidate): Promise<boolean> {
        const relevance = await this.evaluate(candidate);
        return relevance.relevant;
    }

    private async evaluateUncached(candidate: Candidate): Promise<Relevance> {
        const pathReason = this.checkPath(candidate.path);
        if (pathReason) {
            return this.exclude(candidate, pathReason);
        }

        let data: Buffer;
        try {
            data = await candidate.fetch();
        } catch (error) {
            if (error instanceof ContentMissingError) {
                return this.exclude(candidate, 'missing');
            }
            if (error instanceof NotRegularFileError) {
                return this.exclude(candidate, 'not_a_file');
            }
            if (error instanceof WsCheckError) {
                throw error;
            }
            throw new ContentReadError(`无法读取 ${candidate.path}`, { cause: error });
        }

        if (data.includes(0)) {
            return this.exclude(candidate, 'binary');
        }
        return { relevant: true, content: data.toString('utf8') };
    }

    private exclude(candidate: Candidate, reason: ExclusionReason): Relevance {
        const verb = reason === 'missing' || reason === 'not_a_file' || reason === 'binary' ? 'skipping' : 'ignoring';
        this.logger.debug(`${verb} ${candidate.path} (${EXCLUSION_MESSAGES[reason]})`);
        return { relevant: false, reason };
    }

    private matchesIgnoreGlob(normalizedPath: string): boolean {
        return this.globIgnores.some(pattern => {
            const hasPathSeparator = pattern.includes('/');
            return minimatch(normalizedPath, pattern, { dot: true, matchBase: !hasPathSeparator })
                || minimatch(path.posix.basename(normalizedPath), pattern, { dot: true });
        });
    }
}
