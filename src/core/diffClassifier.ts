/**
 * Diff 分类器（状态机）
 *
 * 只检查本次变更新增的行：对 DiffToken 序列做一次 fold，
 * 状态是显式的不可变值，每个 token 产生一个新状态。
 *
 * 转移规则：
 * - file_header：结算上一个文件，解析新路径并判定相关性；不相关则置空 currentFile，
 *   直到下一个文件头之前都不做检测
 * - hunk_header：记录为 currentHunkContext（仅用于报告定位）
 * - inserted_line：对新增文本做缩进字符检查
 * - trailing_whitespace：仅当上一个 token 是 inserted_line 时记一条行尾空白
 * - 其他：只更新 lastLabel
 * 序列结束时结算最后一个文件。
 *
 * 相关性判定需要读取内容（异步），因此由调用方预先算好，以同步谓词传入。
 *
 * pending / reports 用持久链表（新元素在表头）累积，每步 O(1)，结算时再反转为数组。
 */

import type { DiffLabel, DiffToken } from '../types/diff';
import type { Policy } from '../types/policy';
import type { FileReport, Violation } from '../types/violation';
import { buildFileReport } from '../shared/fileReport';
import { detectWrongIndent, renderTrailingPointer } from '../shared/lineScanner';
import { parseFileHeaderPath } from '../utils/diffParser';

export interface DiffClassifierContext {
    policy: Policy;
    /** 路径是否通过候选过滤（路径规则 + 存在性 + 二进制） */
    isRelevant: (filePath: string) => boolean;
}

/** 不可变单链表，表头为最近追加的元素 */
export type Chain<T> = { readonly head: T; readonly tail: Chain<T> } | null;

const prepend = <T>(chain: Chain<T>, head: T): Chain<T> => ({ head, tail: chain });

/** 按追加顺序展开 */
export const chainToArray = <T>(chain: Chain<T>): T[] => {
    const items: T[] = [];
    for (let node = chain; node !== null; node = node.tail) {
        items.push(node.head);
    }
    return items.reverse();
};

export interface DiffClassifierState {
    readonly currentFile: string | null;
    readonly currentHunkContext: string;
    readonly lastLabel: DiffLabel | null;
    /** 最近一个 inserted_line，用于渲染行尾空白指示 */
    readonly lastInserted: DiffToken | null;
    readonly pending: Chain<Violation>;
    readonly reports: Chain<FileReport>;
}

export const initialDiffClassifierState: DiffClassifierState = Object.freeze({
    currentFile: null,
    currentHunkContext: '',
    lastLabel: null,
    lastInserted: null,
    pending: null,
    reports: null,
});

/** 去掉新增行的 '+' 前缀 */
const insertedText = (token: DiffToken): string =>
    token.text.startsWith('+') ? token.text.slice(1) : token.text;

const closeFile = (state: DiffClassifierState): Chain<FileReport> =>
    state.currentFile === null
        ? state.reports
        : prepend(state.reports, buildFileReport(state.currentFile, chainToArray(state.pending)));

const record = (
    state: DiffClassifierState,
    violation: Omit<Violation, 'file' | 'hunk'>
): Chain<Violation> => {
    if (state.currentFile === null) {
        return state.pending;
    }
    return prepend(state.pending, {
        file: state.currentFile,
        hunk: state.currentHunkContext || undefined,
        ...violation,
    });
};

export const stepDiffClassifier = (
    state: DiffClassifierState,
    token: DiffToken,
    context: DiffClassifierContext
): DiffClassifierState => {
    switch (token.label) {
        case 'file_header': {
            const filePath = parseFileHeaderPath(token.text);
            return {
                currentFile: filePath !== null && context.isRelevant(filePath) ? filePath : null,
                currentHunkContext: '',
                lastLabel: token.label,
                lastInserted: null,
                pending: null,
                reports: closeFile(state),
            };
        }
        case 'hunk_header':
            return { ...state, currentHunkContext: token.text, lastLabel: token.label };
        case 'inserted_line': {
            const found = state.currentFile === null
                ? null
                : detectWrongIndent(insertedText(token), context.policy);
            return {
                ...state,
                lastLabel: token.label,
                lastInserted: token,
                pending: found ? record(state, { line: token.newLine, ...found }) : state.pending,
            };
        }
        case 'trailing_whitespace': {
            const previous = state.lastLabel === 'inserted_line' ? state.lastInserted : null;
            if (state.currentFile === null || previous === null) {
                return { ...state, lastLabel: token.label };
            }
            return {
                ...state,
                lastLabel: token.label,
                pending: record(state, {
                    line: token.newLine ?? previous.newLine,
                    kind: 'trailing_whitespace',
                    detail: renderTrailingPointer(insertedText(previous) + token.text, context.policy.tabWidth),
                }),
            };
        }
        default:
            return { ...state, lastLabel: token.label };
    }
};

export const finishDiffClassifier = (state: DiffClassifierState): FileReport[] => chainToArray(closeFile(state));

/**
 * 对完整 token 序列求值，返回每个相关文件的报告（按出现顺序）
 */
export const classifyDiffTokens = (
    tokens: readonly DiffToken[],
    context: DiffClassifierContext
): FileReport[] =>
    finishDiffClassifier(
        tokens.reduce<DiffClassifierState>(
            (state, token) => stepDiffClassifier(state, token, context),
            initialDiffClassifierState
        )
    );

/** 序列中出现的所有文件头路径（去重，保持顺序），供调用方预先判定相关性 */
export const collectDiffPaths = (tokens: readonly DiffToken[]): string[] => {
    const paths = new Set<string>();
    for (const token of tokens) {
        if (token.label !== 'file_header') continue;
        const filePath = parseFileHeaderPath(token.text);
        if (filePath !== null) {
            paths.add(filePath);
        }
    }
    return [...paths];
};
