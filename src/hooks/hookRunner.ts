#!/usr/bin/env node
/**
 * Git Hook Runner - 由 pre-commit hook 调用，检查 staged 变更
 *
 * 发现问题时以 1 退出以阻止提交；配置错误以 2 退出。
 */

import { runCheck } from '../commands/checkCommand';
import { isUserError } from '../utils/errors';

async function main(): Promise<number> {
    const workspaceRoot = process.env.WORKSPACE_ROOT || process.cwd();
    const code = await runCheck({ cwd: workspaceRoot, staged: true });
    if (code !== 0) {
        console.error('提交已被阻止，请修复上述问题后重试（可运行 wscheck check --staged --fix）。');
    }
    return code;
}

main()
    .then(code => {
        process.exitCode = code;
    })
    .catch((error: unknown) => {
        console.error('检查过程出错:', error instanceof Error ? error.message : String(error));
        process.exitCode = isUserError(error) ? 2 : 1;
    });
