/**
 * 文件级报告的构造与文案
 */

import type { IndentMode, Policy } from '../types/policy';
import type { FileReport, Violation, ViolationKind } from '../types/violation';
import { scanLine } from './lineScanner';
import { splitContent } from './text';

/** 违规类型的文案；wrong_indent_char 随缩进模式不同 */
export const describeKind = (kind: ViolationKind, indentMode: IndentMode): string => {
    switch (kind) {
        case 'all_whitespace':
            return 'all whitespace';
        case 'trailing_whitespace':
            return 'trailing whitespace';
        case 'wrong_indent_char':
            return indentMode === 'spaces' ? 'tab character(s)' : 'space indentation';
    }
};

export const buildFileReport = (file: string, violations: readonly Violation[]): FileReport => {
    const kinds: ViolationKind[] = [];
    for (const violation of violations) {
        if (!kinds.includes(violation.kind)) {
            kinds.push(violation.kind);
        }
    }
    return { file, violations, kinds, ok: violations.length === 0 };
};

/** 文件摘要：去重后的违规类型文案，按首次出现顺序以逗号连接 */
export const summarizeKinds = (report: FileReport, indentMode: IndentMode): string =>
    report.ok ? 'ok' : report.kinds.map(kind => describeKind(kind, indentMode)).join(', ');

/**
 * 全文扫描：逐行调用 scanLine，行号从 1 开始
 */
export const scanContent = (file: string, content: string, policy: Policy): FileReport => {
    const { lines } = splitContent(content);
    const violations: Violation[] = [];
    lines.forEach((line, index) => {
        for (const found of scanLine(line, policy)) {
            violations.push({ file, line: index + 1, ...found });
        }
    });
    return buildFileReport(file, violations);
};
