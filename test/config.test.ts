/**
 * panebridge: 配置加载测试
 */

import { describe, expect, test } from "vitest";
import os from "node:os";
import path from "node:path";
import { BridgeError } from "../src/errors.js";
import { CONFIG_DIR, isChatAllowed, loadConfig } from "../src/config.js";

describe("loadConfig", () => {
    test("默认值", () => {
        expect(loadConfig({})).toEqual({
            botToken: undefined,
            allowedChatIds: [],
            tmuxSession: "claude",
            mode: "polling",
            port: 8080,
            logLevel: "info",
            promptPollMs: 500,
            typingIntervalMs: 4000,
            turnMaxAgeSec: 600,
            pendingFile: path.join(CONFIG_DIR, "pending.json"),
            parser: {
                footerScanLines: 5,
                cursorScanLines: 40,
                optionScanLines: 30,
                questionScanLines: 10,
            },
        });
    });

    test("读取环境变量", () => {
        const config = loadConfig({
            TELEGRAM_BOT_TOKEN: " test-secret ",
            ALLOWED_CHAT_IDS: "1, -200",
            TMUX_SESSION: "work",
            BRIDGE_MODE: "WebHook",
            PORT: "9000",
            LOG_LEVEL: "debug",
            PENDING_FILE: "~/x.json",
        });

        expect(config).toMatchObject({
            botToken: "test-secret",
            allowedChatIds: [1, -200],
            tmuxSession: "work",
            mode: "webhook",
            port: 9000,
            logLevel: "debug",
            pendingFile: path.join(os.homedir(), "x.json"),
        });
    });

    test("非法日志级别回退到 info", () => {
        expect(loadConfig({ LOG_LEVEL: "loud" }).logLevel).toBe("info");
    });

    test("非法 BRIDGE_MODE", () => {
        let caught: unknown;
        try {
            loadConfig({ BRIDGE_MODE: "grpc" });
        } catch (error) {
            caught = error;
        }
        expect(caught).toBeInstanceOf(BridgeError);
        expect(caught).toMatchObject({ code: "CONFIG_INVALID" });
    });

    test("非法 chat id", () => {
        expect(() => loadConfig({ ALLOWED_CHAT_IDS: "1,abc" })).toThrow("ALLOWED_CHAT_IDS 含非法 chat id: abc");
    });

    test("非正整数", () => {
        expect(() => loadConfig({ PROMPT_POLL_MS: "0" })).toThrow("PROMPT_POLL_MS 必须是正整数，当前: 0");
    });
});

describe("isChatAllowed", () => {
    test("空白名单不限制", () => {
        expect(isChatAllowed({ allowedChatIds: [] }, 42)).toBe(true);
    });

    test("只放行白名单内的 chat", () => {
        const config = { allowedChatIds: [1, -200] };
        expect(isChatAllowed(config, -200)).toBe(true);
        expect(isChatAllowed(config, 2)).toBe(false);
    });
});
