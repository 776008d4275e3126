/**
 * 候选文件类型定义
 */

/**
 * 候选文件：路径 + 绑定到某个版本的内容读取器
 * 同一路径在不同版本下是不同的候选（缓存按对象区分）
 */
export interface Candidate {
    /** 仓库相对路径（正斜杠） */
    readonly path: string;
    /** 版本标识；null 表示工作区 */
    readonly revision: string | null;
    /**
     * 读取内容；文件在该版本中不存在时抛出 ContentMissingError，
     * 其他读取失败按原错误抛出
     */
    fetch(): Promise<Buffer>;
}

/** 写回修复结果的能力（修复只作用于工作区） */
export interface ContentWriter {
    write(path: string, content: string): Promise<void>;
}
