/**
 * FileScanner 单元测试
 *
 * git 调用通过 mock 的 execFile 返回预设输出；工作区读写使用临时目录。
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

const { execFileAsyncMock } = vi.hoisted(() => ({
    execFileAsyncMock: vi.fn(),
}));

vi.mock('child_process', () => ({
    execFile: Object.assign(
        (_file: string, _args: unknown, _options: unknown, _callback: unknown) => {},
        {
            [Symbol.for('nodejs.util.promisify.custom')]: (file: string, args: string[], options: unknown) =>
                execFileAsyncMock(file, args, options),
        }
    ),
}));

import { FileScanner, describeTarget, parseRawDiffPaths, synthesizeAddedFileDiff } from '../../utils/fileScanner';
import { ContentMissingError, ContentReadError, FixWriteError, GitError, NotRegularFileError } from '../../utils/errors';
import { createTempFileSystem, TempFileSystem } from '../helpers/tempFileSystem';

type GitResponse = string | Buffer | Error;

const gitFailure = (stderr: string): Error => Object.assign(new Error('git failed'), { stderr });

/**
 * 按参数路由 git 调用；去掉 "-c core.quotepath=off" 前缀后与 key 比较，
 * 未登记的调用以失败返回（与 rev-parse --verify 找不到引用时一致）
 */
const routeGit = (responses: Record<string, GitResponse>): void => {
    execFileAsyncMock.mockImplementation(async (_file: string, args: string[]) => {
        const effective = args[0] === '-c' ? args.slice(2) : args;
        const response = responses[effective.join(' ')];
        if (response === undefined) {
            throw gitFailure('');
        }
        if (response instanceof Error) {
            throw response;
        }
        return { stdout: response, stderr: '' };
    });
};

/** `--raw -z` 输出中的一条记录 */
const rawEntry = (filePath: string, newMode = '100644'): string =>
    `:100644 ${newMode} 1111111 2222222 M\0${filePath}\0`;

const DIFF_ARGS = '--no-color --no-ext-diff --no-renames --src-prefix=a/ --dst-prefix=b/';

const gitArgsCalled = (): string[][] => execFileAsyncMock.mock.calls.map(call => call[1]);

describe('FileScanner', () => {
    let tempFs: TempFileSystem;
    let scanner: FileScanner;

    beforeEach(async () => {
        execFileAsyncMock.mockReset();
        tempFs = await createTempFileSystem();
        scanner = new FileScanner(tempFs.getTempDir());
    });

    afterEach(async () => {
        await tempFs.cleanup();
    });

    describe('findRepoRoot', () => {
        it('返回 rev-parse --show-toplevel 的输出', async () => {
            routeGit({ 'rev-parse --show-toplevel': '/repo\n' });
            await expect(FileScanner.findRepoRoot('/repo/src')).resolves.toBe('/repo');
        });

        it('不在仓库中时抛出 GitError', async () => {
            routeGit({});
            await expect(FileScanner.findRepoRoot('/tmp')).rejects.toBeInstanceOf(GitError);
        });
    });

    describe('listFiles', () => {
        it('工作区：相对 HEAD 的改动加上未跟踪文件，去重', async () => {
            routeGit({
                'rev-parse -q --verify HEAD': 'h1\n',
                'diff --raw -z --no-renames h1': rawEntry('a.py') + rawEntry('b.py'),
                'ls-files --others --exclude-standard -z': 'new.py\0a.py\0',
            });

            await expect(scanner.listFiles({ kind: 'working' })).resolves.toEqual(['a.py', 'b.py', 'new.py']);
        });

        it('尚无提交时与空树比较', async () => {
            routeGit({
                'diff --cached --raw -z --no-renames 4b825dc642cb6eb9a060e54bf8d69288fbee4904': rawEntry('first.c'),
            });

            await expect(scanner.listFiles({ kind: 'staged' })).resolves.toEqual(['first.c']);
        });

        it('指定提交：使用 diff-tree', async () => {
            routeGit({ 'diff-tree --no-commit-id --raw -z --no-renames -r --root abc123': rawEntry('x.txt') });

            await expect(scanner.listFiles({ kind: 'revision', rev: 'abc123' })).resolves.toEqual(['x.txt']);
            expect(gitArgsCalled()[0].slice(0, 2)).toEqual(['-c', 'core.quotepath=off']);
        });

        it('子模块与未跟踪的嵌套仓库不作为候选', async () => {
            routeGit({
                'rev-parse -q --verify HEAD': 'h1\n',
                'diff --raw -z --no-renames h1': rawEntry('lib.txt', '160000') + rawEntry('main.c'),
                'ls-files --others --exclude-standard -z': 'vendor/nested/\0notes.txt\0',
            });

            await expect(scanner.listFiles({ kind: 'working' })).resolves.toEqual(['main.c', 'notes.txt']);
        });

        it('路径首尾的空格原样保留', async () => {
            routeGit({
                'rev-parse -q --verify HEAD': 'h1\n',
                'diff --cached --raw -z --no-renames h1': rawEntry(' padded name.py ') + rawEntry('gone.py', '000000'),
            });

            await expect(scanner.listFiles({ kind: 'staged' })).resolves.toEqual([' padded name.py ', 'gone.py']);
        });

        it('git 失败时抛出 GitError', async () => {
            routeGit({ 'diff-tree --no-commit-id --raw -z --no-renames -r --root bad': gitFailure('fatal: bad object') });

            await expect(scanner.listFiles({ kind: 'revision', rev: 'bad' })).rejects.toMatchObject({
                code: 'GitError',
                details: 'fatal: bad object',
            });
        });
    });

    describe('getParents', () => {
        it('指定提交：rev-list 输出中除第一项外都是父提交', async () => {
            routeGit({ 'rev-list --parents -n 1 m1': 'm1 p1 p2\n' });
            await expect(scanner.getParents({ kind: 'revision', rev: 'm1' })).resolves.toEqual(['p1', 'p2']);
        });

        it('根提交没有父提交', async () => {
            routeGit({ 'rev-list --parents -n 1 r0': 'r0\n' });
            await expect(scanner.getParents({ kind: 'revision', rev: 'r0' })).resolves.toEqual([]);
        });

        it('合并进行中时工作区有两个父提交', async () => {
            routeGit({
                'rev-parse -q --verify HEAD': 'h1\n',
                'rev-parse -q --verify MERGE_HEAD': 'm2\n',
            });
            await expect(scanner.getParents({ kind: 'working' })).resolves.toEqual(['h1', 'm2']);
        });

        it('尚无提交时没有父提交', async () => {
            routeGit({});
            await expect(scanner.getParents({ kind: 'staged' })).resolves.toEqual([]);
        });
    });

    describe('candidate', () => {
        it('暂存区内容通过 git show :path 读取', async () => {
            routeGit({ 'show :a.py': Buffer.from('x\n') });
            const candidate = scanner.candidate('a.py', { kind: 'staged' });

            expect(candidate.revision).toBe(':');
            await expect(candidate.fetch()).resolves.toEqual(Buffer.from('x\n'));
        });

        it('版本中不存在的文件抛出 ContentMissingError', async () => {
            routeGit({ 'show abc:gone.py': gitFailure("fatal: path 'gone.py' does not exist in 'abc'") });
            const candidate = scanner.candidate('gone.py', { kind: 'revision', rev: 'abc' });

            await expect(candidate.fetch()).rejects.toBeInstanceOf(ContentMissingError);
        });

        it('其他读取失败抛出 ContentReadError', async () => {
            routeGit({ 'show :a.py': gitFailure('fatal: unable to read 1234') });

            await expect(scanner.candidate('a.py', { kind: 'staged' }).fetch()).rejects.toBeInstanceOf(ContentReadError);
        });

        it('工作区中是目录的路径（子模块）抛出 NotRegularFileError', async () => {
            await tempFs.createDir('lib.txt');

            await expect(scanner.candidate('lib.txt', { kind: 'working' }).fetch()).rejects.toBeInstanceOf(NotRegularFileError);
        });

        it('工作区内容直接从磁盘读取，文件不存在时抛出 ContentMissingError', async () => {
            await tempFs.createFile('src/a.py', 'y = 2\n');

            await expect(scanner.candidate('src/a.py', { kind: 'working' }).fetch()).resolves.toEqual(Buffer.from('y = 2\n'));
            await expect(scanner.candidate('src/none.py', { kind: 'working' }).fetch()).rejects.toBeInstanceOf(ContentMissingError);
            expect(execFileAsyncMock).not.toHaveBeenCalled();
        });
    });

    describe('getDiff', () => {
        it('工作区 diff 追加未跟踪文件的整文件新增片段', async () => {
            const tracked = 'diff --git a/a.py b/a.py\n+++ b/a.py\n@@ -1 +1 @@\n-x\n+y\n';
            routeGit({
                'rev-parse -q --verify HEAD': 'h1\n',
                [`diff ${DIFF_ARGS} h1`]: tracked,
                'ls-files --others --exclude-standard -z': 'new.py\0logo.txt\0',
            });
            await tempFs.createFile('new.py', 'x \n');
            await tempFs.createFile('logo.txt', Buffer.from([0x47, 0x00, 0x46]));

            await expect(scanner.getDiff({ kind: 'working' })).resolves.toBe(tracked + [
                'diff --git a/new.py b/new.py',
                'new file mode 100644',
                '--- /dev/null',
                '+++ b/new.py',
                '@@ -0,0 +1,1 @@',
                '+x ',
                '',
            ].join('\n'));
        });

        it('固定 a/ b/ 前缀，不受用户的 diff 前缀配置影响', async () => {
            routeGit({ [`diff --cached ${DIFF_ARGS} h1`]: '', 'rev-parse -q --verify HEAD': 'h1\n' });

            await scanner.getDiff({ kind: 'staged' });

            const diffCall = gitArgsCalled().find(args => args.includes('--cached'));
            expect(diffCall).toEqual([
                '-c', 'core.quotepath=off', 'diff', '--cached',
                '--no-color', '--no-ext-diff', '--no-renames', '--src-prefix=a/', '--dst-prefix=b/', 'h1',
            ]);
        });

        it('指定提交使用 git show --format=', async () => {
            routeGit({ [`show --format= ${DIFF_ARGS} abc`]: 'diff text\n' });
            await expect(scanner.getDiff({ kind: 'revision', rev: 'abc' })).resolves.toBe('diff text\n');
        });
    });

    describe('writer', () => {
        it('写回工作区文件', async () => {
            await tempFs.createFile('a.py', 'x \n');
            await scanner.writer().write('a.py', 'x\n');

            await expect(tempFs.readFile('a.py')).resolves.toBe('x\n');
        });

        it('写入失败时抛出 FixWriteError', async () => {
            await expect(scanner.writer().write('missing-dir/a.py', 'x\n')).rejects.toBeInstanceOf(FixWriteError);
        });
    });
});

describe('synthesizeAddedFileDiff', () => {
    it('空内容不产生片段', () => {
        expect(synthesizeAddedFileDiff('empty.py', '')).toBe('');
    });

    it('没有末尾换行的内容同样计入最后一行', () => {
        expect(synthesizeAddedFileDiff('a.txt', 'a\nb')).toBe(
            'diff --git a/a.txt b/a.txt\nnew file mode 100644\n--- /dev/null\n+++ b/a.txt\n@@ -0,0 +1,2 @@\n+a\n+b\n'
        );
    });
});

describe('parseRawDiffPaths', () => {
    it('空输出得到空列表', () => {
        expect(parseRawDiffPaths('')).toEqual([]);
    });

    it('跳过新 mode 为 160000 的记录', () => {
        expect(parseRawDiffPaths(rawEntry('a.c') + rawEntry('sub', '160000') + rawEntry('b.c'))).toEqual(['a.c', 'b.c']);
    });
});

describe('describeTarget', () => {
    it('返回报告中使用的名称', () => {
        expect(describeTarget({ kind: 'working' })).toBe('working directory');
        expect(describeTarget({ kind: 'staged' })).toBe('staged changes');
        expect(describeTarget({ kind: 'revision', rev: 'v1.0' })).toBe('v1.0');
    });
});
