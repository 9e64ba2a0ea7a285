/**
 * panebridge: 日志文本格式化工具 BDD 测试
 *
 * 测试场景：
 * - Scenario A: 特殊字符转义
 * - Scenario B: 长文本截断
 * - Scenario C: 非字符串入参
 * - Scenario D: 菜单 / chat 文本
 */

import { describe, test, expect } from "vitest";
import { formatLogTextField } from "../src/logger/format-text.js";

describe("formatLogTextField", () => {
    describe("Scenario A: 特殊字符转义", () => {
        test("反斜杠加倍", () => {
            expect(formatLogTextField("C:\\tmp")).toBe("C:\\\\tmp");
        });

        test("双引号转义", () => {
            expect(formatLogTextField('run "ls"')).toBe('run \\"ls\\"');
        });

        test("\\n 与 \\r\\n 都变成字面量 \\n", () => {
            expect(formatLogTextField("a\nb\r\nc")).toBe("a\\nb\\nc");
        });

        test("普通文本不变", () => {
            expect(formatLogTextField("继续执行")).toBe("继续执行");
        });
    });

    describe("Scenario B: 长文本截断", () => {
        test("等于上限不截断", () => {
            const text = "y".repeat(500);
            expect(formatLogTextField(text)).toBe(text);
        });

        test("超过上限截断并追加省略号", () => {
            expect(formatLogTextField("y".repeat(501))).toBe("y".repeat(500) + "…");
        });

        test("自定义上限", () => {
            expect(formatLogTextField("Which database should we use?", 5)).toBe("Which…");
        });

        test("按转义后的长度截断", () => {
            // 30 个引号转义后 60 字符
            expect(formatLogTextField('"'.repeat(30), 40)).toBe('\\"'.repeat(20) + "…");
        });
    });

    describe("Scenario C: 非字符串入参", () => {
        test("null / undefined / 数字", () => {
            expect(formatLogTextField(null)).toBe("null");
            expect(formatLogTextField(undefined)).toBe("undefined");
            expect(formatLogTextField(42)).toBe("42");
        });

        test("空字符串", () => {
            expect(formatLogTextField("")).toBe("");
        });
    });

    describe("Scenario D: 菜单 / chat 文本", () => {
        test("多行问题", () => {
            expect(formatLogTextField("Do you want to proceed?\n❯ 1. Yes")).toBe("Do you want to proceed?\\n❯ 1. Yes");
        });

        test("选项标签截断到 60", () => {
            const label = "2. Yes, and don't ask again for bash commands in /home/dev/project";
            expect(formatLogTextField(label, 60)).toBe(label.slice(0, 60) + "…");
        });
    });
});
