/**
 * 行扫描（纯函数，无 IO）
 *
 * 对去掉换行符后的单行按顺序判定，命中第一条即停止：
 * 1. 非空且全部为空白 → all_whitespace
 * 2. 以空格或 tab 结尾 → trailing_whitespace
 * 3. 缩进字符检查（见 detectWrongIndent）
 * "空白"只指空格与 tab。
 */

import type { Policy } from '../types/policy';
import type { LineViolation, ViolationDetail } from '../types/violation';
import { expandTabs, stripTrailingWhitespace } from './text';

const WHITESPACE_ONLY = /^[ \t]+$/;
const ENDS_WITH_WHITESPACE = /[ \t]$/;
const LEADING_RUN = /^[ \t]*/;

/**
 * 行尾空白指示：展开 tab 后，在去尾长度之后用 ^ 标出剩余部分
 */
export const renderTrailingPointer = (line: string, tabWidth: number): ViolationDetail => {
    const text = expandTabs(line, tabWidth);
    const trimmedLength = stripTrailingWhitespace(text).length;
    return {
        text,
        pointer: ' '.repeat(trimmedLength) + '^'.repeat(text.length - trimmedLength),
    };
};

/**
 * 缩进字符检查
 *
 * spaces 模式：行内任意位置出现 tab 都算违规（不只是缩进部分），
 *   每个 tab 用 tabWidth 个 ^ 标出。
 * tabs 模式：只看行首空白段；段内含空格且其后还有正文时算违规，
 *   纯 tab 缩进、全空白行不算。每个空格一个 ^，tab 按展开宽度留白。
 */
export const detectWrongIndent = (line: string, policy: Policy): LineViolation | null => {
    if (policy.indentMode === 'spaces') {
        if (!line.includes('\t')) {
            return null;
        }
        const tabIndicator = '^'.repeat(policy.tabWidth);
        let pointer = '';
        for (const ch of line) {
            pointer += ch === '\t' ? tabIndicator : ' ';
        }
        return {
            kind: 'wrong_indent_char',
            detail: { text: expandTabs(line, policy.tabWidth), pointer },
        };
    }

    const run = LEADING_RUN.exec(line)?.[0] ?? '';
    if (!run.includes(' ') || run.length === line.length) {
        return null;
    }
    let pointer = '';
    for (const ch of run) {
        pointer += ch === ' ' ? '^' : ' '.repeat(policy.tabWidth - (pointer.length % policy.tabWidth));
    }
    return {
        kind: 'wrong_indent_char',
        detail: { text: expandTabs(line, policy.tabWidth), pointer },
    };
};

/**
 * 扫描单行，返回 0 或 1 条违规
 */
export const scanLine = (line: string, policy: Policy): LineViolation[] => {
    if (WHITESPACE_ONLY.test(line)) {
        return [{ kind: 'all_whitespace' }];
    }
    if (ENDS_WITH_WHITESPACE.test(line)) {
        return [{ kind: 'trailing_whitespace', detail: renderTrailingPointer(line, policy.tabWidth) }];
    }
    const indentViolation = detectWrongIndent(line, policy);
    return indentViolation ? [indentViolation] : [];
};
