/**
 * 错误类型
 *
 * PolicyError / UsageError 属于用户可修正的错误（CLI 退出码 2），
 * 其余为运行期错误（退出码 1）。ContentMissingError 不是故障，
 * 只用于表示"文件在该版本中不存在"，由候选过滤器按正常排除处理。
 */

export type ErrorCode =
    | 'PolicyError'
    | 'UsageError'
    | 'ContentReadError'
    | 'ContentMissingError'
    | 'NotRegularFileError'
    | 'FixWriteError'
    | 'GitError';

export interface WsCheckErrorOptions {
    cause?: unknown;
    details?: Record<string, unknown> | string;
}

export class WsCheckError extends Error {
    public readonly code: ErrorCode;
    public readonly details?: Record<string, unknown> | string;
    public readonly cause?: unknown;

    constructor(code: ErrorCode, message: string, options: WsCheckErrorOptions = {}) {
        super(message);
        this.name = this.constructor.name;
        this.code = code;
        this.details = options.details;
        this.cause = options.cause;
    }
}

/** 配置值无法解析（如 tab_size 非数字） */
export class PolicyError extends WsCheckError {
    constructor(message: string, options: WsCheckErrorOptions = {}) {
        super('PolicyError', message, options);
    }
}

export class UsageError extends WsCheckError {
    constructor(message: string, options: WsCheckErrorOptions = {}) {
        super('UsageError', message, options);
    }
}

export class ContentMissingError extends WsCheckError {
    constructor(path: string, revision: string | null, options: WsCheckErrorOptions = {}) {
        super('ContentMissingError', `${path} 在 ${revision ?? '工作区'} 中不存在`, options);
    }
}

/** 路径在工作区中不是普通文件（子模块、嵌套仓库），按正常排除处理 */
export class NotRegularFileError extends WsCheckError {
    constructor(path: string, options: WsCheckErrorOptions = {}) {
        super('NotRegularFileError', `${path} 不是普通文件`, options);
    }
}

/** 候选文件存在但无法读取 */
export class ContentReadError extends WsCheckError {
    constructor(message: string, options: WsCheckErrorOptions = {}) {
        super('ContentReadError', message, options);
    }
}

/** 修复写盘失败；已写入的其他文件不回滚 */
export class FixWriteError extends WsCheckError {
    constructor(message: string, options: WsCheckErrorOptions = {}) {
        super('FixWriteError', message, options);
    }
}

export class GitError extends WsCheckError {
    constructor(message: string, options: WsCheckErrorOptions = {}) {
        super('GitError', message, options);
    }
}

export const isUserError = (error: unknown): boolean =>
    error instanceof PolicyError || error instanceof UsageError;
