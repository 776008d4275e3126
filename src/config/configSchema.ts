/**
 * 配置 Schema
 *
 * userConfigSchema 只校验 YAML 的结构（字段类型），
 * policySchema 在合并后做语义校验并转换为 Policy 所需的值。
 */

import { z } from 'zod';

const configListInput = z.union([z.array(z.string()), z.string()]);

/** 列表配置：数组或空格分隔字符串，统一为去空后的字符串数组 */
const configList = configListInput.transform(value =>
    (typeof value === 'string' ? value.split(/\s+/) : value)
        .map(item => item.trim())
        .filter(item => item.length > 0)
);

const tabSize = z.union([z.number(), z.string()]).transform((value, ctx) => {
    const parsed = typeof value === 'number'
        ? value
        : /^\s*\d+\s*$/.test(value) ? parseInt(value, 10) : NaN;
    if (!Number.isInteger(parsed) || parsed < 1) {
        ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `tab_size 必须是不小于 1 的整数，当前值: ${JSON.stringify(value)}`,
        });
        return z.NEVER;
    }
    return parsed;
});

/** .wscheck.yaml 的结构（所有字段可选） */
export const userConfigSchema = z.object({
    checked_exts: configListInput.optional(),
    ignored_exts: configListInput.optional(),
    ignored_files: configListInput.optional(),
    tab_size: z.union([z.number(), z.string()]).optional(),
    indent_mode: z.string().optional(),
    diff_only: z.boolean().optional(),
});

export const policySchema = z.object({
    checked_exts: configList,
    ignored_exts: configList,
    ignored_files: configList,
    tab_size: tabSize,
    indent_mode: z.enum(['spaces', 'tabs'], {
        errorMap: () => ({ message: 'indent_mode 必须是 spaces 或 tabs' }),
    }),
    diff_only: z.boolean(),
});

export type UserConfig = z.infer<typeof userConfigSchema>;
export type ParsedPolicyConfig = z.infer<typeof policySchema>;
