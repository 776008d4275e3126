/**
 * Diff token 类型定义
 *
 * 统一 diff 渲染后按语义角色切分的片段，供 core/diffClassifier 消费。
 * 标签含义与彩色 diff 输出的分类一致。
 */

export type DiffLabel =
    | 'file_header'          // 新文件侧的文件头（+++ b/path）
    | 'hunk_header'          // @@ -a,b +c,d @@
    | 'inserted_line'        // 新增行（不含行尾空白）
    | 'trailing_whitespace'  // 紧随新增行的行尾空白片段
    | 'other';

export interface DiffToken {
    label: DiffLabel;
    /** 渲染文本；inserted_line 保留 '+' 前缀 */
    text: string;
    /** 新文件中的行号（从 1 开始），仅 inserted_line / trailing_whitespace 携带 */
    newLine?: number;
}
