/**
 * 由合并后的配置构造只读 Policy
 */

import type { WsCheckConfig } from '../types/config';
import type { Policy } from '../types/policy';
import { PolicyError } from '../utils/errors';
import { policySchema } from './configSchema';

/** checked_exts 中出现该值时表示检查所有文本文件 */
export const ALL_FILES_SENTINEL = '*';

export const buildPolicy = (config: WsCheckConfig): Policy => {
    const parsed = policySchema.safeParse(config);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => issue.message);
        throw new PolicyError(`配置无效: ${issues.join('; ')}`, { details: { issues } });
    }
    const value = parsed.data;
    const checked = value.checked_exts.includes(ALL_FILES_SENTINEL) ? [] : value.checked_exts;

    return Object.freeze({
        checkedSuffixes: new Set(checked),
        ignoredSuffixes: new Set(value.ignored_exts),
        ignoredPaths: new Set(value.ignored_files),
        tabWidth: value.tab_size,
        indentMode: value.indent_mode,
        diffOnly: value.diff_only,
    });
};
