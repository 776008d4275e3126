/**
 * 配置加载（仅读 YAML 并校验结构，不合并）
 */

import * as path from 'path';
import * as fs from 'fs';
import * as yaml from 'js-yaml';
import type { WsCheckConfig } from '../types/config';
import { PolicyError } from '../utils/errors';
import { Logger } from '../utils/logger';
import { userConfigSchema, type UserConfig } from './configSchema';

export const CONFIG_FILE_NAME = '.wscheck.yaml';

const logger = new Logger('ConfigLoader');

export const DEFAULT_CHECKED_EXTS = [
    '.c', '.h', '.cpp', '.xml', '.cs', '.html', '.js', '.css', '.txt',
    '.py', '.nsi', '.java', '.aspx', '.asp', '.bat', '.cmd', '.glsl',
];

export const getDefaultConfig = (): WsCheckConfig => ({
    checked_exts: [...DEFAULT_CHECKED_EXTS],
    ignored_exts: [],
    ignored_files: [],
    tab_size: 8,
    indent_mode: 'spaces',
    diff_only: false,
});

/**
 * 从给定路径读取 YAML 配置；文件不存在时返回空对象
 * YAML 语法错误或字段类型不对属于致命错误，抛出 PolicyError
 */
export const loadYamlFromPath = async (configPath: string): Promise<UserConfig> => {
    if (!fs.existsSync(configPath)) {
        logger.debug(`未找到配置文件，使用默认配置: ${configPath}`);
        return {};
    }
    const fileContent = await fs.promises.readFile(configPath, 'utf-8');
    let raw: unknown;
    try {
        raw = yaml.load(fileContent);
    } catch (error) {
        throw new PolicyError(`配置文件解析失败: ${configPath}`, { cause: error });
    }
    if (raw === undefined || raw === null) {
        return {};
    }
    const parsed = userConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new PolicyError(`配置文件格式不正确: ${configPath}`, {
            details: parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; '),
        });
    }
    return parsed.data;
};

/**
 * 从工作区根目录加载配置；configPath 为相对路径时相对于工作区根目录
 */
export const loadWorkspaceConfig = async (workspaceRoot: string, configPath?: string): Promise<UserConfig> => {
    const resolved = configPath
        ? path.resolve(workspaceRoot, configPath)
        : path.join(workspaceRoot, CONFIG_FILE_NAME);
    if (configPath && !fs.existsSync(resolved)) {
        throw new PolicyError(`指定的配置文件不存在: ${resolved}`);
    }
    return loadYamlFromPath(resolved);
};
