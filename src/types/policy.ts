/**
 * 检查策略类型定义
 *
 * Policy 在一次运行开始时由配置构造（见 config/policyBuilder.ts），运行期间只读。
 */

/** 缩进字符模式：spaces=只允许空格缩进，tabs=只允许 tab 缩进 */
export type IndentMode = 'spaces' | 'tabs';

export interface Policy {
    /** 需要检查的后缀；空集合表示检查所有文本文件 */
    readonly checkedSuffixes: ReadonlySet<string>;
    /** 显式忽略的后缀，优先级高于 checkedSuffixes */
    readonly ignoredSuffixes: ReadonlySet<string>;
    /** 显式忽略的路径（仓库相对路径，支持 glob） */
    readonly ignoredPaths: ReadonlySet<string>;
    /** tab 宽度（>= 1），用于展开显示与修复 */
    readonly tabWidth: number;
    readonly indentMode: IndentMode;
    /** 仅扫描 diff 中新增的行 */
    readonly diffOnly: boolean;
}
