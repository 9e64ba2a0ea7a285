/**
 * panebridge: 配置加载模块
 *
 * 从 .env 文件加载配置，提供类型安全的配置访问
 *
 * 配置优先级：
 * 1. ~/.config/panebridge/.env（用户配置，优先）
 * 2. 项目根目录 .env（项目配置，后备）
 * 3. 环境变量（系统环境，兜底）
 */

import dotenv from "dotenv";
import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import { BridgeError } from "./errors.js";
import { isLogLevel, type LogLevel } from "./logger/index.js";
import type { ParserOptions } from "./prompt/parser.js";

export const CONFIG_DIR = path.join(os.homedir(), ".config", "panebridge");

export type BridgeMode = "polling" | "webhook";

/**
 * 完整配置
 */
export interface Config {
    // Telegram Bot Token（start 时必填）
    botToken?: string;
    // 白名单 chat id；为空表示不限制
    allowedChatIds: number[];
    // tmux 目标会话
    tmuxSession: string;
    mode: BridgeMode;
    // webhook 模式的 HTTP 端口
    port: number;
    logLevel: LogLevel;
    // 监控循环轮询间隔（毫秒）
    promptPollMs: number;
    // typing 指示刷新间隔（毫秒）
    typingIntervalMs: number;
    // 待响应标记的最长存活时间（秒）
    turnMaxAgeSec: number;
    // 待响应标记文件
    pendingFile: string;
    // 解析器扫描窗口
    parser: ParserOptions;
}

/**
 * 获取 .env 路径（用户配置目录 → 项目根目录）
 */
export function getEnvFilePath(): string | undefined {
    const userConfig = path.join(CONFIG_DIR, ".env");
    if (fs.existsSync(userConfig)) {
        return userConfig;
    }
    const projectConfig = path.join(process.cwd(), ".env");
    if (fs.existsSync(projectConfig)) {
        return projectConfig;
    }
    return undefined;
}

/**
 * 加载 .env 到 process.env（已存在的环境变量不覆盖）
 */
export function loadEnvFile(): string | undefined {
    const envPath = getEnvFilePath();
    if (envPath) {
        dotenv.config({ path: envPath });
    }
    return envPath;
}

function parseChatIds(value: string | undefined): number[] {
    if (!value) return [];
    const ids: number[] = [];
    for (const part of value.split(",").map(s => s.trim()).filter(Boolean)) {
        const id = Number(part);
        if (!Number.isInteger(id)) {
            throw new BridgeError("CONFIG_INVALID", `ALLOWED_CHAT_IDS 含非法 chat id: ${part}`);
        }
        ids.push(id);
    }
    return ids;
}

/**
 * 解析正整数配置；未设置时返回默认值
 */
function parsePositiveInt(env: NodeJS.ProcessEnv, key: string, fallback: number): number {
    const raw = env[key]?.trim();
    if (!raw) return fallback;
    const n = Number(raw);
    if (!Number.isInteger(n) || n <= 0) {
        throw new BridgeError("CONFIG_INVALID", `${key} 必须是正整数，当前: ${raw}`);
    }
    return n;
}

function expandHome(filePath: string): string {
    return filePath.startsWith("~/") ? path.join(os.homedir(), filePath.slice(2)) : filePath;
}

/**
 * 加载配置（只读传入的 env，便于测试）
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const mode = (env.BRIDGE_MODE ?? "polling").trim().toLowerCase();
    if (mode !== "polling" && mode !== "webhook") {
        throw new BridgeError("CONFIG_INVALID", `BRIDGE_MODE 仅支持 polling / webhook，当前: ${mode}`);
    }

    const logLevel = env.LOG_LEVEL;

    return {
        botToken: env.TELEGRAM_BOT_TOKEN?.trim() || undefined,
        allowedChatIds: parseChatIds(env.ALLOWED_CHAT_IDS),
        tmuxSession: env.TMUX_SESSION?.trim() || "claude",
        mode,
        port: parsePositiveInt(env, "PORT", 8080),
        logLevel: isLogLevel(logLevel) ? logLevel : "info",
        promptPollMs: parsePositiveInt(env, "PROMPT_POLL_MS", 500),
        typingIntervalMs: parsePositiveInt(env, "TYPING_INTERVAL_MS", 4000),
        turnMaxAgeSec: parsePositiveInt(env, "TURN_MAX_AGE_S", 600),
        pendingFile: expandHome(env.PENDING_FILE?.trim() || path.join(CONFIG_DIR, "pending.json")),
        parser: {
            footerScanLines: parsePositiveInt(env, "PROMPT_FOOTER_SCAN", 5),
            cursorScanLines: parsePositiveInt(env, "PROMPT_CURSOR_SCAN", 40),
            optionScanLines: parsePositiveInt(env, "PROMPT_OPTION_SCAN", 30),
            questionScanLines: parsePositiveInt(env, "PROMPT_QUESTION_SCAN", 10),
        },
    };
}

/**
 * 检查 chat 是否在白名单中
 */
export function isChatAllowed(config: Pick<Config, "allowedChatIds">, chatId: number): boolean {
    return config.allowedChatIds.length === 0 || config.allowedChatIds.includes(chatId);
}
