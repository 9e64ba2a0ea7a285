/**
 * panebridge: Markdown → Telegram HTML
 *
 * 只处理回复里常见的几种：代码块、行内代码、粗体、斜体。
 * 代码先换成占位符，转义与强调替换完成后再放回，避免代码里的 * 被当成强调。
 */

const escapeHtml = (text: string): string =>
    text.replace(/&/g, "&amp;").replace(/</g, "&lt;").replace(/>/g, "&gt;");

export function toTelegramHtml(markdown: string): string {
    const blocks: Array<{ lang: string; code: string }> = [];
    const inlines: string[] = [];

    let text = markdown.replace(/```(\w*)\n?([\s\S]*?)```/g, (_match, lang: string, code: string) => {
        blocks.push({ lang, code });
        return `\u0000B${blocks.length - 1}\u0000`;
    });
    text = text.replace(/`([^`\n]+)`/g, (_match, code: string) => {
        inlines.push(code);
        return `\u0000I${inlines.length - 1}\u0000`;
    });

    text = escapeHtml(text)
        .replace(/\*\*(.+?)\*\*/g, "<b>$1</b>")
        .replace(/(?<!\*)\*([^*]+)\*(?!\*)/g, "<i>$1</i>");

    return text
        .replace(/\u0000B(\d+)\u0000/g, (_match, index: string) => {
            const block = blocks[Number(index)];
            if (!block) return "";
            const code = escapeHtml(block.code.trim());
            return block.lang ? `<pre><code class="language-${block.lang}">${code}</code></pre>` : `<pre>${code}</pre>`;
        })
        .replace(/\u0000I(\d+)\u0000/g, (_match, index: string) => `<code>${escapeHtml(inlines[Number(index)] ?? "")}</code>`);
}
