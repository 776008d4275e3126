/**
 * 违规与报告类型定义
 *
 * 集中维护 Violation、FileReport、RunReport，供 shared、core、commands 等模块引用。
 */

/** 违规类型 */
export type ViolationKind = 'all_whitespace' | 'trailing_whitespace' | 'wrong_indent_char';

/**
 * 可视化指示：展开 tab 后的原始行 + 与之对齐的 ^ 指示行
 */
export interface ViolationDetail {
    text: string;
    pointer: string;
}

/**
 * 单条违规
 * line 仅在 diff 模式下渲染器未提供行号时缺省，此时用 hunk 头定位
 */
export interface Violation {
    file: string;
    line?: number;
    kind: ViolationKind;
    detail?: ViolationDetail;
    hunk?: string;
}

/** 不含文件信息的行级违规（scanLine 的产出） */
export type LineViolation = Omit<Violation, 'file' | 'line' | 'hunk'>;

/**
 * 单个文件的检查结果
 * kinds 中每种类型最多出现一次（用于摘要），violations 保留每一次出现（用于计数）
 */
export interface FileReport {
    file: string;
    violations: readonly Violation[];
    kinds: readonly ViolationKind[];
    ok: boolean;
}

/** 一次运行的汇总 */
export interface RunReport {
    filesWithIssues: number;
    totalIssues: number;
}
