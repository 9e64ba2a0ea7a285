/**
 * panebridge: 交互式菜单解析
 *
 * 从归一化后的 pane 文本里识别宿主 CLI 绘制的选择菜单：
 *
 *     Which database should we use?
 *
 *     ❯ 1. Postgres
 *          Relational, mature
 *       2. SQLite
 *          Embedded, single file
 *
 *     Enter to select · ↑/↓ to navigate · Esc to cancel
 *
 * 自底向上定位：先找 footer，再找光标行，再向上找首个选项和问题。
 * 上方的对话滚动区不可信，宁可漏检也不误检。
 */

import type { ParsedPrompt, PromptOption } from "./types.js";

/**
 * 扫描窗口（行数）
 */
export interface ParserOptions {
    /** footer 只在最后 N 个非空行里找 */
    footerScanLines?: number;
    /** 从 footer 向上找光标行的最大行数 */
    cursorScanLines?: number;
    /** 从光标行向上找首个选项的最大行数 */
    optionScanLines?: number;
    /** 从首个选项向上找问题的最大行数 */
    questionScanLines?: number;
}

export const DEFAULT_PARSER_OPTIONS: Required<ParserOptions> = {
    footerScanLines: 5,
    cursorScanLines: 40,
    optionScanLines: 30,
    questionScanLines: 10,
};

export const FALLBACK_QUESTION = "Select an option:";

const CURSOR_GLYPHS = new Set(["❯", "›", ">"]);
const BOX_CORNERS = /[╭╮╰╯]/;
// "1. Yes" / "2) No"
const ENUMERATION = /^\d+[.)]\s/;
const DASH_SEPARATOR = /^[─—–-]{1,3}$/;

function indentOf(line: string): number {
    return line.length - line.trimStart().length;
}

/**
 * 横线分隔（───────）
 */
export function isHorizontalRule(line: string): boolean {
    const s = line.trim();
    if (s.length <= 10) {
        return false;
    }
    let count = 0;
    for (const ch of s) {
        if (ch === "─") count++;
    }
    return count > s.length * 0.7;
}

/**
 * 光标行：光标字符 + 空格开头（入参为 trim 后的行）
 */
export function isCursorLine(trimmed: string): boolean {
    return trimmed.length > 1 && CURSOR_GLYPHS.has(trimmed[0] ?? "") && trimmed[1] === " ";
}

/**
 * footer：同时包含"确认"和"导航"提示
 */
export function isMenuFooter(trimmed: string): boolean {
    const lower = trimmed.toLowerCase();
    if (!lower.includes("to navigate")) {
        return false;
    }
    return lower.startsWith("enter") || lower.includes("to select") || lower.includes("to confirm");
}

function isBoxBorder(trimmed: string): boolean {
    return BOX_CORNERS.test(trimmed);
}

function resolveOptions(options: ParserOptions): Required<ParserOptions> {
    return {
        footerScanLines: options.footerScanLines ?? DEFAULT_PARSER_OPTIONS.footerScanLines,
        cursorScanLines: options.cursorScanLines ?? DEFAULT_PARSER_OPTIONS.cursorScanLines,
        optionScanLines: options.optionScanLines ?? DEFAULT_PARSER_OPTIONS.optionScanLines,
        questionScanLines: options.questionScanLines ?? DEFAULT_PARSER_OPTIONS.questionScanLines,
    };
}

function findFooter(lines: string[], maxNonEmpty: number): number {
    let seen = 0;
    for (let i = lines.length - 1; i >= 0 && seen < maxNonEmpty; i--) {
        const s = (lines[i] ?? "").trim();
        if (!s) continue;
        seen++;
        if (isMenuFooter(s)) {
            return i;
        }
    }
    return -1;
}

function findCursor(lines: string[], footerLine: number, window: number): number {
    for (let i = footerLine - 1; i >= Math.max(0, footerLine - window); i--) {
        if (isCursorLine((lines[i] ?? "").trim())) {
            return i;
        }
    }
    return -1;
}

/**
 * 从光标行向上找首个选项
 *
 * 编号菜单（光标项以 "1." 之类开头）里，不带编号的同级行视为问题而非选项。
 */
function findFirstOption(lines: string[], cursorLine: number, labelIndent: number, enumerated: boolean, window: number): number {
    let firstOption = cursorLine;
    for (let i = cursorLine - 1; i >= Math.max(0, cursorLine - window); i--) {
        const line = lines[i] ?? "";
        const s = line.trim();
        if (!s || isHorizontalRule(line) || isBoxBorder(s)) {
            break;
        }
        if (DASH_SEPARATOR.test(s)) {
            continue;
        }
        if (isCursorLine(s)) {
            firstOption = i;
            continue;
        }
        if (indentOf(line) > labelIndent) {
            // 上一个选项的描述折行
            continue;
        }
        if (enumerated && !ENUMERATION.test(s)) {
            break;
        }
        firstOption = i;
    }
    return firstOption;
}

function findQuestion(lines: string[], firstOption: number, window: number): string {
    for (let i = firstOption - 1; i >= Math.max(0, firstOption - window); i--) {
        const line = lines[i] ?? "";
        const s = line.trim();
        if (!s) continue;
        if (isHorizontalRule(line) || isBoxBorder(s)) {
            break;
        }
        if (s.length > 5) {
            return s;
        }
    }
    return "";
}

/**
 * 解析交互式菜单
 *
 * 入参应为 normalizeScreen 之后的文本。没有菜单（或不足 2 个选项）时返回 null。
 */
export function parsePrompt(text: string, options: ParserOptions = {}): ParsedPrompt | null {
    const opts = resolveOptions(options);
    const lines = text.split("\n");

    const footerLine = findFooter(lines, opts.footerScanLines);
    if (footerLine < 0) {
        return null;
    }

    const cursorLine = findCursor(lines, footerLine, opts.cursorScanLines);
    if (cursorLine < 0) {
        return null;
    }

    const cursorText = lines[cursorLine] ?? "";
    // 光标字符 + 空格 = 2 列
    const labelIndent = indentOf(cursorText) + 2;
    const enumerated = ENUMERATION.test(cursorText.trim().slice(2).trimStart());

    const firstOption = findFirstOption(lines, cursorLine, labelIndent, enumerated, opts.optionScanLines);
    const question = findQuestion(lines, firstOption, opts.questionScanLines);

    const collected: PromptOption[] = [];
    let highlightedIndex = 0;

    for (let i = firstOption; i < footerLine; i++) {
        const line = lines[i] ?? "";
        const s = line.trim();
        if (!s || isHorizontalRule(line) || DASH_SEPARATOR.test(s)) {
            continue;
        }

        if (isCursorLine(s)) {
            highlightedIndex = collected.length;
            collected.push({ label: s.slice(2).trim() });
            continue;
        }

        if (indentOf(line) <= labelIndent) {
            collected.push({ label: s });
            continue;
        }

        const last = collected[collected.length - 1];
        if (last) {
            last.description = last.description ? `${last.description} ${s}` : s;
        }
    }

    if (collected.length < 2) {
        return null;
    }

    return {
        question: question || FALLBACK_QUESTION,
        options: collected,
        highlightedIndex,
    };
}
