/**
 * panebridge: Markdown → Telegram HTML 测试
 */

import { describe, expect, test } from "vitest";
import { toTelegramHtml } from "../src/turn/markdown.js";

describe("toTelegramHtml", () => {
    test("行内代码、粗体、斜体与转义", () => {
        expect(toTelegramHtml("Run `a<b` **now** & *check*")).toBe(
            "Run <code>a&lt;b</code> <b>now</b> &amp; <i>check</i>"
        );
    });

    test("带语言的代码块", () => {
        expect(toTelegramHtml("Fix:\n```ts\nconst ok = 1 < 2;\n```")).toBe(
            'Fix:\n<pre><code class="language-ts">const ok = 1 &lt; 2;</code></pre>'
        );
    });

    test("代码块内的 * 不当作强调", () => {
        expect(toTelegramHtml("```\nls *.ts **/x\n```")).toBe("<pre>ls *.ts **/x</pre>");
    });
});
