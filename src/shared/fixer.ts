/**
 * 修复（纯函数，无 IO）
 *
 * 与 lineScanner 使用同一套判定；写盘由调用方负责（见 core/checkEngine.ts）。
 * 输出保留原内容末尾换行的有无。
 */

import type { Policy } from '../types/policy';
import { scanLine } from './lineScanner';
import { expandTabs, joinContent, splitContent, stripTrailingWhitespace } from './text';

const WHITESPACE_ONLY = /^[ \t]+$/;
const INDENTED_TEXT = /^([ \t]+)(?=[^ \t])/;

/**
 * tabs 模式下的缩进段转换：先按列展开为空格，再把每 tabWidth 个连续空格折回一个 tab
 * 不足 tabWidth 的余数空格保留
 */
export const collapseIndent = (run: string, tabWidth: number): string =>
    expandTabs(run, tabWidth).replace(new RegExp(` {${tabWidth}}`, 'g'), '\t');

export const fixLine = (line: string, policy: Policy): string => {
    if (policy.indentMode === 'spaces') {
        return expandTabs(stripTrailingWhitespace(line), policy.tabWidth);
    }
    if (WHITESPACE_ONLY.test(line)) {
        return '';
    }
    const trimmed = stripTrailingWhitespace(line);
    const match = INDENTED_TEXT.exec(trimmed);
    if (!match) {
        return trimmed;
    }
    const run = match[1];
    return collapseIndent(run, policy.tabWidth) + trimmed.slice(run.length);
};

/** 内容中是否至少有一行被 scanLine 判为违规 */
export const needsFix = (content: string, policy: Policy): boolean =>
    splitContent(content).lines.some(line => scanLine(line, policy).length > 0);

export const fixContent = (content: string, policy: Policy): string => {
    const split = splitContent(content);
    return joinContent({ ...split, lines: split.lines.map(line => fixLine(line, policy)) });
};
