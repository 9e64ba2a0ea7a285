/**
 * panebridge: File Transport Logger BDD 测试
 *
 * 测试场景：
 * - Scenario A: 行格式与 meta 字段
 * - Scenario B: 写入文件
 * - Scenario C: 按大小轮转
 */

import { describe, test, expect, beforeEach, afterEach } from "vitest";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import { mkdirSync, rmSync, readFileSync, existsSync, writeFileSync } from "node:fs";
import { FileTransport, formatFileLine } from "../src/logger/file-transport.js";
import { ConsoleTransport } from "../src/logger/console-transport.js";

async function flush(transport: FileTransport): Promise<void> {
    transport.close();
    await new Promise(resolve => setTimeout(resolve, 100));
}

describe("formatFileLine", () => {
    describe("Scenario A: 行格式与 meta 字段", () => {
        test("无 meta", () => {
            expect(formatFileLine({
                timestamp: "2026-01-02 03:04:05",
                level: "info",
                message: "菜单已发布",
                module: "publisher",
            })).toBe("2026-01-02 03:04:05 [INFO ] [publisher] 菜单已发布\n");
        });

        test("chatId / messageId / 指纹截断 / 长度", () => {
            const line = formatFileLine({
                timestamp: "2026-01-02 03:04:05",
                level: "debug",
                message: "菜单状态已更新",
                meta: {
                    chatId: 1001,
                    messageId: 7,
                    fingerprint: "0123456789abcdef0123",
                    textLength: 12,
                },
            });
            expect(line).toBe("2026-01-02 03:04:05 [DEBUG] 菜单状态已更新 [chatId=1001 messageId=7 fp=0123456789ab textLen=12]\n");
        });

        test("error 字段加引号并截断到 200", () => {
            const line = formatFileLine({
                timestamp: "t",
                level: "error",
                message: "菜单发布失败",
                meta: { error: "e".repeat(250) },
            });
            expect(line).toBe(`t [ERROR] 菜单发布失败 [error="${"e".repeat(200)}"]\n`);
        });

        test("不认识的 meta 字段不写入", () => {
            const line = formatFileLine({
                timestamp: "t",
                level: "warn",
                message: "m",
                meta: { question: "secret question" },
            });
            expect(line).toBe("t [WARN ] m\n");
        });
    });
});

describe("FileTransport", () => {
    let tempWorkspace: string;
    let logFilePath: string;

    beforeEach(() => {
        tempWorkspace = join(tmpdir(), `panebridge-log-test-${randomUUID()}`);
        mkdirSync(tempWorkspace, { recursive: true });
        logFilePath = join(tempWorkspace, "nested", "bridge.log");
    });

    afterEach(() => {
        if (existsSync(tempWorkspace)) {
            rmSync(tempWorkspace, { recursive: true, force: true });
        }
    });

    describe("Scenario B: 写入文件", () => {
        test("自动创建目录并追加写入", async () => {
            const transport = new FileTransport({ filename: logFilePath });
            transport.write({ timestamp: "t1", level: "info", message: "first" });
            transport.write({ timestamp: "t2", level: "warn", message: "second", meta: { error: "boom" } });
            await flush(transport);

            expect(readFileSync(logFilePath, "utf-8")).toBe('t1 [INFO ] first\nt2 [WARN ] second [error="boom"]\n');
        });
    });

    describe("Scenario C: 按大小轮转", () => {
        test("已有文件超过上限时启动即轮转到 .1", async () => {
            mkdirSync(join(tempWorkspace, "nested"), { recursive: true });
            writeFileSync(logFilePath, "x".repeat(64));

            const transport = new FileTransport({ filename: logFilePath, maxSize: 32 });
            transport.write({ timestamp: "t", level: "info", message: "fresh" });
            await flush(transport);

            expect(readFileSync(`${logFilePath}.1`, "utf-8")).toBe("x".repeat(64));
            expect(readFileSync(logFilePath, "utf-8")).toBe("t [INFO ] fresh\n");
        });
    });
});

describe("ConsoleTransport", () => {
    test("无颜色格式附带 error", () => {
        const transport = new ConsoleTransport({ colorize: false });
        expect(transport.format({
            timestamp: "t",
            level: "error",
            message: "tick 失败",
            module: "monitor",
            meta: { error: "tmux gone" },
        })).toBe("t [ERROR] [monitor] tick 失败 (tmux gone)");
    });
});
