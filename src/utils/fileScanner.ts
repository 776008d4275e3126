/**
 * 文件扫描器
 *
 * 负责与 Git 交互：列出候选文件、按版本读取内容、查询父提交、生成 unified diff。
 *
 * 支持三种检查对象：
 * - working: 工作区（相对 HEAD 的改动 + 未跟踪文件）
 * - staged: 暂存区（git diff --cached）
 * - revision: 指定提交
 */

import * as fs from 'fs';
import * as path from 'path';
import { execFile } from 'child_process';
import { promisify } from 'util';
import type { Candidate, ContentWriter } from '../types/candidate';
import { ContentMissingError, ContentReadError, FixWriteError, GitError, NotRegularFileError } from './errors';
import { Logger } from './logger';

const execFileAsync = promisify(execFile);
const EMPTY_TREE_HASH = '4b825dc642cb6eb9a060e54bf8d69288fbee4904';
const MAX_BUFFER_BYTES = 64 * 1024 * 1024;
const MISSING_BLOB_PATTERNS = [/does not exist in/, /exists on disk, but not in/, /not in the index/, /invalid object name/i];

export type ChangeTarget =
    | { kind: 'working' }
    | { kind: 'staged' }
    | { kind: 'revision'; rev: string };

/**
 * 变更来源：引擎只通过这个接口获取候选与 diff
 */
export interface ChangeSource {
    listFiles(target: ChangeTarget): Promise<string[]>;
    candidate(filePath: string, target: ChangeTarget): Candidate;
    getParents(target: ChangeTarget): Promise<string[]>;
    getDiff(target: ChangeTarget): Promise<string>;
    writer(): ContentWriter;
}

/** 报告中使用的检查对象名称 */
export const describeTarget = (target: ChangeTarget): string => {
    switch (target.kind) {
        case 'working':
            return 'working directory';
        case 'staged':
            return 'staged changes';
        case 'revision':
            return target.rev;
    }
};

const errorStderr = (error: unknown): string => {
    if (typeof error !== 'object' || error === null || !('stderr' in error)) return '';
    const { stderr } = error;
    if (Buffer.isBuffer(stderr)) return stderr.toString('utf8');
    return typeof stderr === 'string' ? stderr : '';
};

const errorCode = (error: unknown): unknown =>
    error instanceof Error && 'code' in error ? error.code : undefined;

const GITLINK_MODE = '160000';

/** 按 NUL 切分 -z 输出；路径原样保留（不 trim） */
const splitNul = (stdout: string): string[] => stdout.split('\0').filter(entry => entry.length > 0);

/**
 * 解析 `--raw -z` 输出：每条记录为 ":<旧mode> <新mode> <旧sha> <新sha> <状态>" 与路径两段
 * 子模块（gitlink）不是文本文件，直接丢弃
 */
export const parseRawDiffPaths = (stdout: string): string[] => {
    const entries = splitNul(stdout);
    const paths: string[] = [];
    for (let i = 0; i + 1 < entries.length; i += 2) {
        const [, newMode] = entries[i].slice(1).split(' ');
        if (newMode !== GITLINK_MODE) {
            paths.push(entries[i + 1]);
        }
    }
    return paths;
};

/**
 * 为未跟踪文件构造"整文件新增"的 diff 片段，使其在 diff 模式下同样被检查
 */
export const synthesizeAddedFileDiff = (filePath: string, content: string): string => {
    const lines = content.split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === '') {
        lines.pop();
    }
    if (lines.length === 0) {
        return '';
    }
    return [
        `diff --git a/${filePath} b/${filePath}`,
        'new file mode 100644',
        '--- /dev/null',
        `+++ b/${filePath}`,
        `@@ -0,0 +1,${lines.length} @@`,
        ...lines.map(line => `+${line}`),
        '',
    ].join('\n');
};

/**
 * 文件扫描器类
 *
 * 使用方式：
 * ```typescript
 * const root = await FileScanner.findRepoRoot(process.cwd());
 * const scanner = new FileScanner(root);
 * const files = await scanner.listFiles({ kind: 'staged' });
 * ```
 */
export class FileScanner implements ChangeSource {
    private readonly logger = new Logger('FileScanner');
    private baseRefPromise: Promise<string> | null = null;

    constructor(private readonly workspaceRoot: string) {}

    /** 定位仓库根目录；不在 git 仓库中时抛出 GitError */
    static async findRepoRoot(cwd: string): Promise<string> {
        try {
            const { stdout } = await execFileAsync('git', ['rev-parse', '--show-toplevel'], {
                cwd,
                encoding: 'utf-8',
            });
            return stdout.trim();
        } catch (error) {
            throw new GitError(`未找到 git 仓库: ${cwd}`, { cause: error, details: errorStderr(error) });
        }
    }

    async listFiles(target: ChangeTarget): Promise<string[]> {
        let files: string[];
        switch (target.kind) {
            case 'working': {
                const base = await this.resolveBaseRef();
                const tracked = parseRawDiffPaths(await this.git(['diff', '--raw', '-z', '--no-renames', base]));
                files = [...tracked, ...(await this.listUntracked())];
                break;
            }
            case 'staged': {
                const base = await this.resolveBaseRef();
                files = parseRawDiffPaths(await this.git(['diff', '--cached', '--raw', '-z', '--no-renames', base]));
                break;
            }
            case 'revision':
                files = parseRawDiffPaths(
                    await this.git(['diff-tree', '--no-commit-id', '--raw', '-z', '--no-renames', '-r', '--root', target.rev])
                );
                break;
        }
        const unique = [...new Set(files)];
        this.logger.debug(`${describeTarget(target)}: ${unique.length} 个候选文件`);
        return unique;
    }

    candidate(filePath: string, target: ChangeTarget): Candidate {
        if (target.kind === 'working') {
            const absolutePath = path.join(this.workspaceRoot, filePath);
            return {
                path: filePath,
                revision: null,
                fetch: async () => {
                    try {
                        return await fs.promises.readFile(absolutePath);
                    } catch (error) {
                        const code = errorCode(error);
                        if (code === 'ENOENT' || code === 'ENOTDIR') {
                            throw new ContentMissingError(filePath, null, { cause: error });
                        }
                        if (code === 'EISDIR') {
                            // 子模块或未跟踪的嵌套仓库在工作区中是目录
                            throw new NotRegularFileError(filePath, { cause: error });
                        }
                        throw new ContentReadError(`读取文件失败: ${filePath}`, { cause: error });
                    }
                },
            };
        }
        const revision = target.kind === 'staged' ? ':' : target.rev;
        const objectName = target.kind === 'staged' ? `:${filePath}` : `${target.rev}:${filePath}`;
        return {
            path: filePath,
            revision,
            fetch: () => this.showBlob(objectName, filePath, revision),
        };
    }

    /**
     * 父提交列表
     * 工作区 / 暂存区的父提交是 HEAD；合并进行中（存在 MERGE_HEAD）时再加上 MERGE_HEAD
     */
    async getParents(target: ChangeTarget): Promise<string[]> {
        if (target.kind === 'revision') {
            const [, ...parents] = (await this.git(['rev-list', '--parents', '-n', '1', target.rev])).trim().split(/\s+/);
            return parents;
        }
        const head = await this.verifyRef('HEAD');
        if (!head) {
            return [];
        }
        const mergeHead = await this.verifyRef('MERGE_HEAD');
        return mergeHead ? [head, mergeHead] : [head];
    }

    async getDiff(target: ChangeTarget): Promise<string> {
        // 固定 a/ b/ 前缀，不受 diff.noprefix / diff.mnemonicPrefix 影响
        const diffArgs = ['--no-color', '--no-ext-diff', '--no-renames', '--src-prefix=a/', '--dst-prefix=b/'];
        switch (target.kind) {
            case 'working': {
                const tracked = await this.git(['diff', ...diffArgs, await this.resolveBaseRef()]);
                const untracked: string[] = [];
                for (const filePath of await this.listUntracked()) {
                    const data = await this.candidate(filePath, target).fetch().catch((error: unknown) => {
                        if (error instanceof ContentMissingError || error instanceof NotRegularFileError) return null;
                        throw error;
                    });
                    // 二进制内容不进入文本 diff，过滤器会再次排除
                    if (data && !data.includes(0)) {
                        untracked.push(synthesizeAddedFileDiff(filePath, data.toString('utf8')));
                    }
                }
                return [tracked, ...untracked]
                    .filter(part => part.length > 0)
                    .map(part => (part.endsWith('\n') ? part : `${part}\n`))
                    .join('');
            }
            case 'staged':
                return this.git(['diff', '--cached', ...diffArgs, await this.resolveBaseRef()]);
            case 'revision':
                return this.git(['show', '--format=', ...diffArgs, target.rev]);
        }
    }

    /** 修复只写回工作区 */
    writer(): ContentWriter {
        return {
            write: async (filePath: string, content: string) => {
                try {
                    await fs.promises.writeFile(path.join(this.workspaceRoot, filePath), content, 'utf-8');
                } catch (error) {
                    throw new FixWriteError(`写入修复结果失败: ${filePath}`, { cause: error });
                }
            },
        };
    }

    private async listUntracked(): Promise<string[]> {
        // 未跟踪的嵌套仓库以 "dir/" 形式列出，不是候选文件
        return splitNul(await this.git(['ls-files', '--others', '--exclude-standard', '-z']))
            .filter(entry => !entry.endsWith('/'));
    }

    /** HEAD；尚无提交时使用空树 */
    private resolveBaseRef(): Promise<string> {
        if (!this.baseRefPromise) {
            this.baseRefPromise = this.verifyRef('HEAD').then(head => head ?? EMPTY_TREE_HASH);
        }
        return this.baseRefPromise;
    }

    private async verifyRef(ref: string): Promise<string | null> {
        try {
            const { stdout } = await execFileAsync('git', ['rev-parse', '-q', '--verify', ref], {
                cwd: this.workspaceRoot,
                encoding: 'utf-8',
            });
            return stdout.trim() || null;
        } catch {
            // rev-parse -q --verify 在引用不存在时以非 0 退出，属正常情况
            return null;
        }
    }

    private async showBlob(objectName: string, filePath: string, revision: string): Promise<Buffer> {
        try {
            const { stdout } = await execFileAsync('git', ['-c', 'core.quotepath=off', 'show', objectName], {
                cwd: this.workspaceRoot,
                encoding: 'buffer',
                maxBuffer: MAX_BUFFER_BYTES,
            });
            return stdout;
        } catch (error) {
            const stderr = errorStderr(error);
            if (MISSING_BLOB_PATTERNS.some(pattern => pattern.test(stderr))) {
                throw new ContentMissingError(filePath, revision, { cause: error });
            }
            throw new ContentReadError(`读取 ${objectName} 失败`, { cause: error, details: stderr });
        }
    }

    private async git(args: string[]): Promise<string> {
        try {
            const { stdout } = await execFileAsync('git', ['-c', 'core.quotepath=off', ...args], {
                cwd: this.workspaceRoot,
                encoding: 'utf-8',
                maxBuffer: MAX_BUFFER_BYTES,
            });
            return stdout;
        } catch (error) {
            throw new GitError(`git ${args[0]} 执行失败`, { cause: error, details: errorStderr(error) });
        }
    }
}
