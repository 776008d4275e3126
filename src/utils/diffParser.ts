/**
 * Unified diff 切分器
 *
 * 将 `git diff` / `git show` 的原始输出切分为带语义标签的 DiffToken 序列，
 * 标签与彩色 diff 渲染的分类一致，供 core/diffClassifier 消费。
 * 仅为新增行及其行尾空白附带新文件行号。
 */

import type { DiffToken } from '../types/diff';

const NEW_FILE_HEADER = /^\+\+\+ /;
const HUNK_HEADER = /^@@ -(\d+)(?:,(\d+))? \+(\d+)(?:,(\d+))? @@/;
const TRAILING_RUN = /[ \t]+$/;

/**
 * 从新文件侧文件头中取出路径
 *
 * 去掉 "+++ "、tab 之后的元数据（时间戳等）、b/ 前缀与引号；
 * /dev/null（文件被删除）或空路径返回 null
 *
 * @example parseFileHeaderPath('+++ b/src/a.ts\t2024-01-01') // 'src/a.ts'
 */
export function parseFileHeaderPath(headerText: string): string | null {
    if (!NEW_FILE_HEADER.test(headerText)) {
        return null;
    }
    let target = headerText.slice(4).split('\t')[0].trimEnd();
    if (target.startsWith('"') && target.endsWith('"') && target.length >= 2) {
        target = target.slice(1, -1).replace(/\\\\/g, '\\');
    }
    if (!target || target === '/dev/null') {
        return null;
    }
    return target.startsWith('b/') ? target.slice(2) : target;
}

/**
 * 切分 unified diff 原始文本
 *
 * hunk 内部按 -a,b +c,d 的行数计数，计满后才退出 hunk，
 * 避免把内容为 "-- x" / "++ x" 的增删行误判为文件头。
 *
 * @param raw - git diff 的完整输出（需 --no-color）
 */
export function tokenizeUnifiedDiff(raw: string): DiffToken[] {
    const tokens: DiffToken[] = [];
    const lines = raw.split(/\r?\n/);
    if (lines.length > 0 && lines[lines.length - 1] === '') {
        lines.pop();
    }

    let oldRemaining = 0;
    let newRemaining = 0;
    let newLine = 0;

    for (const line of lines) {
        const inHunk = oldRemaining > 0 || newRemaining > 0;

        if (inHunk) {
            const prefix = line[0];
            if (prefix === '+') {
                const trailing = TRAILING_RUN.exec(line.slice(1));
                const body = trailing ? line.slice(0, line.length - trailing[0].length) : line;
                tokens.push({ label: 'inserted_line', text: body, newLine });
                if (trailing) {
                    tokens.push({ label: 'trailing_whitespace', text: trailing[0], newLine });
                }
                newLine++;
                newRemaining--;
                continue;
            }
            if (prefix === '-') {
                oldRemaining--;
            } else if (prefix === ' ' || line === '') {
                // 上下文行计入两侧；部分工具会把空上下文行输出为空串
                oldRemaining--;
                newRemaining--;
                newLine++;
            }
            // "\ No newline at end of file" 不计数
            tokens.push({ label: 'other', text: line });
            continue;
        }

        const hunkMatch = line.match(HUNK_HEADER);
        if (hunkMatch) {
            oldRemaining = parseInt(hunkMatch[2] ?? '1', 10);
            newRemaining = parseInt(hunkMatch[4] ?? '1', 10);
            newLine = parseInt(hunkMatch[3], 10);
            tokens.push({ label: 'hunk_header', text: line });
            continue;
        }

        if (NEW_FILE_HEADER.test(line)) {
            tokens.push({ label: 'file_header', text: line });
            continue;
        }

        tokens.push({ label: 'other', text: line });
    }

    return tokens;
}
