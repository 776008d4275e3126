/**
 * 配置相关类型定义
 *
 * .wscheck.yaml 的数据结构；字段名沿用 snake_case，与配置文件保持一致。
 */

import type { IndentMode } from './policy';

/** 列表类配置既可以写成 YAML 数组，也可以写成空格分隔的字符串 */
export type ConfigList = string[] | string;

export interface WsCheckConfig {
    /** 需要检查的后缀；'*' 或空列表表示全部文本文件 */
    checked_exts: ConfigList;
    ignored_exts: ConfigList;
    ignored_files: ConfigList;
    /** YAML 里可能写成字符串，校验时再转为整数 */
    tab_size: number | string;
    indent_mode: IndentMode | string;
    diff_only: boolean;
}

/** 命令行覆盖项（优先级高于配置文件） */
export interface ConfigOverrides {
    tab_size?: number | string;
    indent_mode?: string;
    diff_only?: boolean;
}
