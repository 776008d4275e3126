/**
 * GitHookManager 单元测试
 *
 * 测试用例覆盖：
 * - hook 安装 / 重复安装 / 备份已有 hook
 * - 卸载只删除本工具安装的 hook
 * - Windows / Unix 脚本生成
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import { GitHookManager } from '../../hooks/gitHookManager';
import { createTempFileSystem, TempFileSystem } from '../helpers/tempFileSystem';

const withPlatform = <T>(platform: NodeJS.Platform, run: () => T): T => {
    const originalPlatform = process.platform;
    Object.defineProperty(process, 'platform', { value: platform, writable: true });
    try {
        return run();
    } finally {
        Object.defineProperty(process, 'platform', { value: originalPlatform, writable: true });
    }
};

describe('GitHookManager', () => {
    let tempFs: TempFileSystem;
    let manager: GitHookManager;

    beforeEach(async () => {
        tempFs = await createTempFileSystem();
        await tempFs.createDir('.git/hooks');
        manager = new GitHookManager(tempFs.getTempDir(), '/opt/wscheck/hooks/hookRunner.js');
    });

    afterEach(async () => {
        await tempFs.cleanup();
    });

    describe('installPreCommitHook', () => {
        it('写入可执行的 pre-commit 脚本', async () => {
            await expect(manager.installPreCommitHook()).resolves.toBe(true);

            const content = await tempFs.readFile('.git/hooks/pre-commit');
            expect(content).toContain('/opt/wscheck/hooks/hookRunner.js');
            await expect(manager.isHookInstalled()).resolves.toBe(true);
            if (process.platform !== 'win32') {
                const stat = await fs.promises.stat(tempFs.getPath('.git/hooks/pre-commit'));
                expect(stat.mode & 0o111).not.toBe(0);
            }
        });

        it('已安装时不重复写入，也不产生备份', async () => {
            await manager.installPreCommitHook();
            await manager.installPreCommitHook();

            const entries = await fs.promises.readdir(tempFs.getPath('.git/hooks'));
            expect(entries).toEqual(['pre-commit']);
        });

        it('存在其他 hook 时先备份', async () => {
            await tempFs.createFile('.git/hooks/pre-commit', '#!/bin/sh\nrun-lint\n');

            await manager.installPreCommitHook();

            const entries = await fs.promises.readdir(tempFs.getPath('.git/hooks'));
            const backups = entries.filter(entry => entry.startsWith('pre-commit.backup.'));
            expect(backups).toHaveLength(1);
            await expect(tempFs.readFile(`.git/hooks/${backups[0]}`)).resolves.toBe('#!/bin/sh\nrun-lint\n');
        });

        it('找不到 .git/hooks 时返回 false', async () => {
            await fs.promises.rm(tempFs.getPath('.git/hooks'), { recursive: true });
            await expect(manager.installPreCommitHook()).resolves.toBe(false);
        });
    });

    describe('uninstallPreCommitHook', () => {
        it('删除本工具安装的 hook', async () => {
            await manager.installPreCommitHook();

            await expect(manager.uninstallPreCommitHook()).resolves.toBe(true);
            await expect(tempFs.fileExists('.git/hooks/pre-commit')).resolves.toBe(false);
        });

        it('保留其他工具的 hook', async () => {
            await tempFs.createFile('.git/hooks/pre-commit', '#!/bin/sh\nrun-lint\n');

            await expect(manager.uninstallPreCommitHook()).resolves.toBe(false);
            await expect(tempFs.fileExists('.git/hooks/pre-commit')).resolves.toBe(true);
        });

        it('hook 不存在时视为已卸载', async () => {
            await expect(manager.uninstallPreCommitHook()).resolves.toBe(true);
        });
    });

    describe('getGitHookPath', () => {
        it('从子目录向上查找 .git/hooks', async () => {
            const nested = await tempFs.createDir('src/deep');
            const nestedManager = new GitHookManager(nested);

            expect(nestedManager.getGitHookPath()).toBe(tempFs.getPath('.git/hooks'));
        });
    });

    describe('generateHookScript', () => {
        it('Windows 脚本为批处理，失败时以 1 退出', () => {
            const script = withPlatform('win32', () => manager.generateHookScript());

            expect(script).toContain('@echo off');
            expect(script).toContain('REM wscheck pre-commit hook');
            expect(script).toContain('set "WORKSPACE_ROOT=');
            expect(script).toContain('if errorlevel 1');
            expect(script).toContain('exit /b 1');
        });

        it('Unix 脚本使用当前 Node 的完整路径', () => {
            const script = withPlatform('linux', () => manager.generateHookScript());

            expect(script.startsWith('#!/bin/sh\n# wscheck pre-commit hook\n')).toBe(true);
            expect(script).toContain(`export WORKSPACE_ROOT="${tempFs.getTempDir()}"`);
            expect(script).toContain(`"${process.execPath}" "/opt/wscheck/hooks/hookRunner.js"`);
        });
    });
});
