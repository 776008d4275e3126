/**
 * Git Hook 管理器
 *
 * 负责安装和卸载 Git pre-commit hook
 *
 * Git Hook 工作原理：
 * - Git 在执行 commit 前会自动执行 .git/hooks/pre-commit 脚本
 * - 如果脚本退出码为 0，提交继续；非 0 则提交被阻止
 *
 * Hook 脚本内容：
 * - 调用编译后的 hookRunner.js，由它检查 staged 变更
 */

import * as path from 'path';
import * as fs from 'fs';
import { Logger } from '../utils/logger';

const HOOK_MARKER = 'wscheck';

/**
 * 使用方式：
 * ```typescript
 * const hookManager = new GitHookManager(workspaceRoot);
 * await hookManager.installPreCommitHook();
 * ```
 */
export class GitHookManager {
    private logger: Logger;

    constructor(
        private readonly workspaceRoot: string,
        private readonly hookRunnerPath: string = path.join(__dirname, 'hookRunner.js')
    ) {
        this.logger = new Logger('GitHookManager');
    }

    /**
     * 安装 pre-commit hook
     *
     * 已存在且是本工具的 hook 时直接返回；存在其他 hook 时先备份再写入。
     *
     * @returns 安装是否成功
     */
    async installPreCommitHook(): Promise<boolean> {
        const hookPath = this.getGitHookPath();
        if (!hookPath) {
            this.logger.error('无法找到 .git/hooks 目录');
            return false;
        }

        const preCommitHookPath = path.join(hookPath, 'pre-commit');

        if (fs.existsSync(preCommitHookPath)) {
            const existingContent = await fs.promises.readFile(preCommitHookPath, 'utf-8');
            if (existingContent.includes(HOOK_MARKER)) {
                this.logger.info('pre-commit hook 已安装');
                return true;
            }
            const backupPath = `${preCommitHookPath}.backup.${Date.now()}`;
            await fs.promises.copyFile(preCommitHookPath, backupPath);
            this.logger.important(`已备份现有 hook 到: ${backupPath}`);
        }

        // mode 0o755：可执行（rwxr-xr-x）
        await fs.promises.writeFile(preCommitHookPath, this.generateHookScript(), { mode: 0o755 });
        this.logger.info('pre-commit hook 安装成功');
        return true;
    }

    async uninstallPreCommitHook(): Promise<boolean> {
        const hookPath = this.getGitHookPath();
        if (!hookPath) {
            return false;
        }

        const preCommitHookPath = path.join(hookPath, 'pre-commit');
        if (!fs.existsSync(preCommitHookPath)) {
            this.logger.info('pre-commit hook 不存在');
            return true;
        }

        const content = await fs.promises.readFile(preCommitHookPath, 'utf-8');
        if (!content.includes(HOOK_MARKER)) {
            this.logger.warn('pre-commit hook 不是 wscheck 安装的，未卸载');
            return false;
        }
        await fs.promises.unlink(preCommitHookPath);
        this.logger.info('pre-commit hook 卸载成功');
        return true;
    }

    async isHookInstalled(): Promise<boolean> {
        const hookPath = this.getGitHookPath();
        if (!hookPath) {
            return false;
        }
        const preCommitHookPath = path.join(hookPath, 'pre-commit');
        if (!fs.existsSync(preCommitHookPath)) {
            return false;
        }
        const content = await fs.promises.readFile(preCommitHookPath, 'utf-8');
        return content.includes(HOOK_MARKER);
    }

    /** 自工作区向上查找 .git/hooks */
    getGitHookPath(): string | null {
        let currentPath = this.workspaceRoot;
        while (currentPath !== path.dirname(currentPath)) {
            const gitPath = path.join(currentPath, '.git');
            if (fs.existsSync(gitPath)) {
                const hooksPath = path.join(gitPath, 'hooks');
                return fs.existsSync(hooksPath) ? hooksPath : null;
            }
            currentPath = path.dirname(currentPath);
        }
        return null;
    }

    /**
     * 生成 hook 脚本：Windows 为批处理，其他平台为 sh
     * 使用当前 Node 可执行文件的完整路径，避免 hook 环境中 PATH 不可用
     */
    generateHookScript(): string {
        const isWindows = process.platform === 'win32';
        const workspaceRootPath = isWindows ? path.normalize(this.workspaceRoot) : this.workspaceRoot;
        const hookRunnerPath = isWindows ? path.normalize(this.hookRunnerPath) : this.hookRunnerPath;
        const nodeExecPath = isWindows ? path.normalize(process.execPath) : process.execPath;

        if (isWindows) {
            return `@echo off
REM ${HOOK_MARKER} pre-commit hook
set "WORKSPACE_ROOT=${workspaceRootPath}"
"${nodeExecPath}" "${hookRunnerPath}"
if errorlevel 1 (
    exit /b 1
)
exit /b 0
`;
        }
        return `#!/bin/sh
# ${HOOK_MARKER} pre-commit hook
export WORKSPACE_ROOT="${workspaceRootPath}"
"${nodeExecPath}" "${hookRunnerPath}"
exit $?
`;
    }
}
