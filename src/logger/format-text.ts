/**
 * panebridge: 日志文本字段格式化工具
 *
 * 聊天文本、选项标签写进日志前统一转义与截断
 */

/**
 * 格式化日志文本字段（转义 + 截断）
 *
 * 1. 转义：\ → \\, " → \", 换行 → \n
 * 2. 超过 maxChars 时截断并追加省略号
 *
 * @example
 * formatLogTextField("hello")           // "hello"
 * formatLogTextField("line1\nline2")    // "line1\\nline2"
 * formatLogTextField("a".repeat(600))   // 前 500 字符 + "…"
 */
export function formatLogTextField(value: unknown, maxChars = 500): string {
    const raw = String(value);

    // 先转义反斜杠，再转义其他
    const normalized = raw
        .replace(/\\/g, "\\\\")
        .replace(/"/g, '\\"')
        .replace(/\r?\n/g, "\\n");

    return normalized.length > maxChars
        ? `${normalized.slice(0, maxChars)}…`
        : normalized;
}
