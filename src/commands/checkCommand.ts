/**
 * 命令：wscheck check - 检查（并可选修复）变更文件中的空白问题
 *
 * 返回值即进程退出码：0=无问题或已全部修复，1=发现问题（含修复后仍残留的问题）
 */

import type { Command } from 'commander';
import { loadWorkspaceConfig, getDefaultConfig } from '../config/configLoader';
import { mergeConfig } from '../config/configMerger';
import { buildPolicy } from '../config/policyBuilder';
import { CheckEngine } from '../core/checkEngine';
import type { ConfigOverrides } from '../types/config';
import { UsageError } from '../utils/errors';
import { describeTarget, FileScanner, type ChangeSource, type ChangeTarget } from '../utils/fileScanner';
import { Logger } from '../utils/logger';
import { ConsoleReportOutput, type ReportOutput, type Verbosity } from '../utils/reportOutput';

export interface CheckOptions {
    cwd?: string;
    config?: string;
    fix?: boolean;
    tabsize?: string;
    indentMode?: string;
    diffOnly?: boolean;
    rev?: string;
    staged?: boolean;
    verbose?: boolean;
    quiet?: boolean;
    debug?: boolean;
}

/** 可替换的依赖，测试中注入内存实现 */
export interface CheckDeps {
    source?: ChangeSource;
    output?: ReportOutput;
}

const logger = new Logger('check');

export const resolveTarget = (options: CheckOptions): ChangeTarget => {
    if (options.rev && options.staged) {
        throw new UsageError('--rev 与 --staged 不能同时使用');
    }
    if (options.rev) {
        return { kind: 'revision', rev: options.rev };
    }
    return options.staged ? { kind: 'staged' } : { kind: 'working' };
};

export const resolveVerbosity = (options: CheckOptions): Verbosity => {
    if (options.quiet) return 'quiet';
    return options.verbose || options.debug ? 'verbose' : 'normal';
};

export const runCheck = async (options: CheckOptions, deps: CheckDeps = {}): Promise<number> => {
    Logger.setLevel(options.debug ? 'debug' : 'warn');

    const target = resolveTarget(options);
    if (options.fix && target.kind === 'revision') {
        throw new UsageError('--fix 只能用于工作区或暂存区');
    }

    const cwd = options.cwd ?? process.cwd();
    const workspaceRoot = deps.source ? cwd : await FileScanner.findRepoRoot(cwd);
    const source = deps.source ?? new FileScanner(workspaceRoot);
    const output = deps.output ?? new ConsoleReportOutput(resolveVerbosity(options));

    const overrides: ConfigOverrides = {
        tab_size: options.tabsize,
        indent_mode: options.indentMode,
        diff_only: options.diffOnly ? true : undefined,
    };
    const config = mergeConfig(getDefaultConfig(), await loadWorkspaceConfig(workspaceRoot, options.config), overrides);
    const policy = buildPolicy(config);

    logger.debug(`checked extensions: ${[...policy.checkedSuffixes].join(' ') || '*'}`);
    logger.debug(`ignored files: ${[...policy.ignoredPaths].join(' ')}`);
    logger.debug(`tab width: ${policy.tabWidth}, indent mode: ${policy.indentMode}, diff only: ${policy.diffOnly}`);

    const engine = new CheckEngine(policy, output);
    const targetLabel = describeTarget(target);

    const result = policy.diffOnly
        ? await (async () => {
            const parents = await source.getParents(target);
            const diff = parents.length === 1 ? await source.getDiff(target) : '';
            return engine.checkChange(
                { parents, diff, candidateFor: filePath => source.candidate(filePath, target) },
                targetLabel
            );
        })()
        : await engine.checkCandidates(
            (await source.listFiles(target)).map(filePath => source.candidate(filePath, target)),
            targetLabel
        );

    if (!result.hadIssues) {
        return 0;
    }
    if (!options.fix) {
        return 1;
    }

    // 修复总是基于工作区内容，避免把暂存区版本覆盖到未暂存的改动上
    const working: ChangeTarget = { kind: 'working' };
    const candidates = (await source.listFiles(target)).map(filePath => source.candidate(filePath, working));
    const { remaining } = await engine.fixCandidates(candidates, source.writer());
    if (remaining.length > 0) {
        output.warn(`${remaining.length} file(s) still have issues after fixing.`);
        return 1;
    }
    return 0;
};

export const registerCheckCommand = (program: Command): void => {
    program
        .command('check', { isDefault: true })
        .description('check changed files for tabs, trailing whitespace and blank-only lines')
        .option('-f, --fix', 'fix files by converting indentation and removing trailing whitespace')
        .option('-t, --tabsize <n>', 'tab width (default: 8 or tab_size in .wscheck.yaml)')
        .option('--indent-mode <mode>', 'indentation character policy: spaces or tabs')
        .option('--diff-only', 'only check lines added by the change')
        .option('-r, --rev <rev>', 'check a commit instead of the working directory')
        .option('--staged', 'check the staged changes')
        .option('-c, --config <path>', 'configuration file (default: .wscheck.yaml)')
        .option('-v, --verbose', 'show the location of offending characters in each line')
        .option('-q, --quiet', 'hide file names and only report summary information')
        .option('--debug', 'show settings and details about each file considered')
        .action(async (options: CheckOptions) => {
            process.exitCode = await runCheck(options);
        });
};
