/**
 * 配置合并：默认配置 < 配置文件 < 命令行覆盖项
 */

import type { ConfigOverrides, WsCheckConfig } from '../types/config';
import type { UserConfig } from './configSchema';

export const mergeConfig = (
    defaultConfig: WsCheckConfig,
    userConfig: UserConfig,
    overrides: ConfigOverrides = {}
): WsCheckConfig => ({
    checked_exts: userConfig.checked_exts ?? defaultConfig.checked_exts,
    ignored_exts: userConfig.ignored_exts ?? defaultConfig.ignored_exts,
    ignored_files: userConfig.ignored_files ?? defaultConfig.ignored_files,
    tab_size: overrides.tab_size ?? userConfig.tab_size ?? defaultConfig.tab_size,
    indent_mode: overrides.indent_mode ?? userConfig.indent_mode ?? defaultConfig.indent_mode,
    diff_only: overrides.diff_only ?? userConfig.diff_only ?? defaultConfig.diff_only,
});
