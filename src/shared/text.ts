/**
 * 文本工具（无外部依赖）
 */

const LINE_BREAK = /\r\n|\r|\n/;
const FIRST_TERMINATOR = /\r\n|\r|\n/;

/**
 * 按列展开 tab：每个 tab 前进到下一个 tabWidth 的整数倍列
 */
export const expandTabs = (line: string, tabWidth: number): string => {
    let result = '';
    let column = 0;
    for (const ch of line) {
        if (ch === '\t') {
            const width = tabWidth - (column % tabWidth);
            result += ' '.repeat(width);
            column += width;
        } else {
            result += ch;
            column += 1;
        }
    }
    return result;
};

/** 去掉行尾的空格与 tab（不处理其他空白字符） */
export const stripTrailingWhitespace = (line: string): string => line.replace(/[ \t]+$/, '');

export interface SplitContent {
    lines: string[];
    /** 原内容是否以换行结尾 */
    endsWithNewline: boolean;
    /** 文件中出现的第一个换行符，没有则为 '\n' */
    eol: string;
}

/**
 * 按 \r\n / \r / \n 切分内容，行内不含换行符
 * 末尾换行不会产生额外的空行；空内容得到零行
 */
export const splitContent = (content: string): SplitContent => {
    const eol = FIRST_TERMINATOR.exec(content)?.[0] ?? '\n';
    if (content.length === 0) {
        return { lines: [], endsWithNewline: false, eol };
    }
    const lines = content.split(LINE_BREAK);
    const endsWithNewline = content.endsWith('\n') || content.endsWith('\r');
    if (endsWithNewline) {
        lines.pop();
    }
    return { lines, endsWithNewline, eol };
};

/**
 * 用 eol（文件中的第一个换行符）连接所有行
 * 混合换行的文件会被统一为这一种，未改动的行也可能因此改变换行符
 */
export const joinContent = ({ lines, endsWithNewline, eol }: SplitContent): string => {
    const body = lines.join(eol);
    return endsWithNewline ? body + eol : body;
};
