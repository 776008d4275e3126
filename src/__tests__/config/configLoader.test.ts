import { beforeEach, describe, expect, it, vi } from 'vitest';

const mocked = vi.hoisted(() => ({
    existsSync: vi.fn(),
    readFile: vi.fn(),
}));

vi.mock('fs', () => ({
    existsSync: mocked.existsSync,
    promises: {
        readFile: mocked.readFile,
    },
}));

import * as path from 'path';
import { getDefaultConfig, loadWorkspaceConfig, loadYamlFromPath } from '../../config/configLoader';
import { PolicyError } from '../../utils/errors';

describe('configLoader', () => {
    beforeEach(() => {
        vi.clearAllMocks();
    });

    it('loadYamlFromPath: 文件不存在时返回空对象', async () => {
        mocked.existsSync.mockReturnValue(false);
        const result = await loadYamlFromPath('/ws/.wscheck.yaml');
        expect(result).toEqual({});
        expect(mocked.readFile).not.toHaveBeenCalled();
    });

    it('loadYamlFromPath: 文件存在时应解析 YAML', async () => {
        mocked.existsSync.mockReturnValue(true);
        mocked.readFile.mockResolvedValue('checked_exts: .py .c\nignored_files:\n  - vendor/x.c\ntab_size: 4\n');

        const result = await loadYamlFromPath('/ws/.wscheck.yaml');
        expect(result).toEqual({
            checked_exts: '.py .c',
            ignored_files: ['vendor/x.c'],
            tab_size: 4,
        });
    });

    it('loadYamlFromPath: 空文件视为没有配置', async () => {
        mocked.existsSync.mockReturnValue(true);
        mocked.readFile.mockResolvedValue('');
        await expect(loadYamlFromPath('/ws/.wscheck.yaml')).resolves.toEqual({});
    });

    it('loadYamlFromPath: YAML 语法错误时抛出 PolicyError', async () => {
        mocked.existsSync.mockReturnValue(true);
        mocked.readFile.mockResolvedValue('checked_exts: [bad');

        await expect(loadYamlFromPath('/ws/.wscheck.yaml')).rejects.toBeInstanceOf(PolicyError);
    });

    it('loadYamlFromPath: 字段类型不对时抛出 PolicyError 并带上字段路径', async () => {
        mocked.existsSync.mockReturnValue(true);
        mocked.readFile.mockResolvedValue('diff_only: maybe\n');

        const error = await loadYamlFromPath('/ws/.wscheck.yaml').catch((e: unknown) => e);
        if (!(error instanceof PolicyError)) {
            throw new Error('应抛出 PolicyError');
        }
        expect(error.message).toBe('配置文件格式不正确: /ws/.wscheck.yaml');
        expect(error.details).toBe('diff_only: Expected boolean, received string');
    });

    it('loadWorkspaceConfig: 默认读取工作区根目录下的 .wscheck.yaml', async () => {
        mocked.existsSync.mockReturnValue(false);
        await loadWorkspaceConfig('/ws');
        expect(mocked.existsSync).toHaveBeenCalledWith(path.join('/ws', '.wscheck.yaml'));
    });

    it('loadWorkspaceConfig: 显式指定的配置文件不存在时抛出 PolicyError', async () => {
        mocked.existsSync.mockReturnValue(false);
        await expect(loadWorkspaceConfig('/ws', 'custom.yaml')).rejects.toBeInstanceOf(PolicyError);
    });

    it('getDefaultConfig: 每次返回独立的副本', () => {
        const first = getDefaultConfig();
        const second = getDefaultConfig();
        expect(first).toEqual(second);
        expect(first.checked_exts).not.toBe(second.checked_exts);
        expect(first).toMatchObject({ tab_size: 8, indent_mode: 'spaces', diff_only: false });
    });
});
