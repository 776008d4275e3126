/**
 * 命令：wscheck install-hook / uninstall-hook
 */

import type { Command } from 'commander';
import { GitHookManager } from '../hooks/gitHookManager';
import { FileScanner } from '../utils/fileScanner';

export const registerHookCommands = (program: Command): void => {
    program
        .command('install-hook')
        .description('install a git pre-commit hook that checks staged changes')
        .action(async () => {
            const manager = new GitHookManager(await FileScanner.findRepoRoot(process.cwd()));
            const installed = await manager.installPreCommitHook();
            console.log(installed ? 'pre-commit hook installed' : 'pre-commit hook not installed');
            process.exitCode = installed ? 0 : 1;
        });

    program
        .command('uninstall-hook')
        .description('remove the pre-commit hook installed by wscheck')
        .action(async () => {
            const manager = new GitHookManager(await FileScanner.findRepoRoot(process.cwd()));
            const removed = await manager.uninstallPreCommitHook();
            console.log(removed ? 'pre-commit hook removed' : 'pre-commit hook left in place');
            process.exitCode = removed ? 0 : 1;
        });
};
