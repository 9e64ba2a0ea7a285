/**
 * panebridge: chat 命令与消息路由
 *
 * - /xxx：内置命令；未知命令原样转发给宿主 CLI（如 /compact）
 * - 普通文本：屏幕上有菜单时作为自由输入回答，否则开启新回合
 */

import { logger } from "../logger/index.js";
import { formatLogTextField } from "../logger/format-text.js";
import { errorMessage } from "../errors.js";
import { captureTail, sendMessage, type TerminalTarget } from "../tmux/sender.js";
import type { PromptBridge } from "../prompt/bridge.js";
import type { ChatRef } from "../prompt/types.js";
import type { PendingTurnStore } from "../turn/pending.js";
import type { PromptMonitor } from "../turn/monitor.js";
import type { TypingIndicator } from "../turn/typing.js";

/**
 * 命令处理结果
 */
export interface CommandResult {
    /** 是否成功 */
    success: boolean;
    /** 返回给用户的消息（为空表示不回复） */
    message: string;
}

/**
 * 路由依赖
 */
export interface RouteDeps {
    bridge: PromptBridge;
    terminal: TerminalTarget;
    pending: PendingTurnStore;
    monitor: Pick<PromptMonitor, "start" | "isRunning">;
    typing: Pick<TypingIndicator, "start">;
    sessionName: string;
}

interface CommandHandlerOptions {
    chatId: ChatRef;
    /** 命令参数 */
    args: string[];
    deps: RouteDeps;
}

type CommandHandler = (options: CommandHandlerOptions) => Promise<CommandResult>;

export const SCREENSHOT_LINES = 40;
export const SCROLL_DEFAULT_LINES = 20;
export const SCROLL_MAX_LINES = 200;

export const HELP_TEXT = [
    "panebridge commands:",
    "  /stop - Interrupt (Escape) and end the current request",
    "  /screenshot - Show the last 40 lines of the terminal",
    "  /scroll [n] - Show the last n lines (default 20, max 200)",
    "  /pick <n|dismiss> - Select option n (0-based) or dismiss the prompt",
    "  /y, /n, /ok - Quick answers",
    "  /status - Session and request state",
    "  /help - This message",
    "",
    "Any other text is sent to the terminal.",
].join("\n");

const QUICK_ANSWERS: Record<string, string> = {
    "/y": "yes",
    "/n": "no",
    "/ok": "ok, continue",
};

const ok = (message: string): CommandResult => ({ success: true, message });
const fail = (message: string): CommandResult => ({ success: false, message });

async function requireSession(deps: RouteDeps): Promise<CommandResult | null> {
    if (await deps.terminal.exists()) {
        return null;
    }
    return fail(`tmux session '${deps.sessionName}' not found`);
}

const handlers: Record<string, CommandHandler> = {
    "/help": async () => ok(HELP_TEXT),

    "/stop": async ({ deps }) => {
        const missing = await requireSession(deps);
        if (missing) return missing;
        try {
            await deps.terminal.sendKey("Escape");
        } catch (error) {
            return fail(`Failed to send Escape: ${errorMessage(error)}`);
        }
        deps.pending.end();
        await deps.bridge.interrupt();
        return ok("Interrupted");
    },

    "/screenshot": async ({ deps }) => {
        const missing = await requireSession(deps);
        if (missing) return missing;
        const tail = await captureTail(deps.terminal, SCREENSHOT_LINES, true);
        return ok(tail || "(empty screen)");
    },

    "/scroll": async ({ args, deps }) => {
        let lines = SCROLL_DEFAULT_LINES;
        if (args[0] !== undefined) {
            const n = Number(args[0]);
            if (!Number.isInteger(n) || n <= 0) {
                return fail("Usage: /scroll [lines]");
            }
            lines = Math.min(n, SCROLL_MAX_LINES);
        }
        const missing = await requireSession(deps);
        if (missing) return missing;
        const tail = await captureTail(deps.terminal, lines);
        return ok(tail || "(empty screen)");
    },

    "/pick": async ({ args, deps }) => {
        const arg = args[0]?.toLowerCase();
        if (arg === undefined) {
            return fail("Usage: /pick <number|dismiss>");
        }
        const missing = await requireSession(deps);
        if (missing) return missing;

        if (arg === "dismiss") {
            await deps.bridge.dismiss();
            return ok("Dismissed");
        }

        const index = /^\d+$/.test(arg) ? Number(arg) : Number.NaN;
        const result = await deps.bridge.pick(index);
        if (!result.ok) {
            return fail(result.message);
        }
        return ok(result.label !== undefined ? `Selected: ${result.label}` : `Selected option ${result.index}`);
    },

    "/status": async ({ deps }) => {
        const running = await deps.terminal.exists();
        const snapshot = deps.bridge.state.snapshot();
        const lines = [
            `tmux: ${deps.sessionName} (${running ? "running" : "not found"})`,
            `Request: ${deps.pending.isPending() ? "working" : "idle"}`,
            `Prompt: ${snapshot.boundMessage !== undefined ? `${snapshot.options.length} options` : "none"}`,
        ];
        return ok(lines.join("\n"));
    },
};

for (const [command, answer] of Object.entries(QUICK_ANSWERS)) {
    handlers[command] = async ({ deps }) => {
        const missing = await requireSession(deps);
        if (missing) return missing;
        const sent = await sendMessage(deps.terminal, answer);
        return sent.success ? ok(`Sent: ${answer}`) : fail(`Failed to send: ${sent.error ?? "unknown"}`);
    };
}

/**
 * 解析 "/cmd@botname arg1 arg2"
 */
export function parseCommand(text: string): { command: string; args: string[] } | null {
    if (!text.startsWith("/")) {
        return null;
    }
    const [head = "", ...args] = text.trim().split(/\s+/);
    const command = head.split("@")[0]?.toLowerCase() ?? "";
    return { command, args };
}

export function isKnownCommand(command: string): boolean {
    return Object.prototype.hasOwnProperty.call(handlers, command);
}

/**
 * 开启新回合：置位待响应、启动 typing 与监控、发送文本
 */
export async function beginTurn(chatId: ChatRef, text: string, deps: RouteDeps): Promise<CommandResult> {
    const missing = await requireSession(deps);
    if (missing) return missing;

    deps.pending.begin(chatId);
    deps.typing.start(chatId);
    deps.monitor.start(chatId);

    const sent = await sendMessage(deps.terminal, text);
    if (!sent.success) {
        deps.pending.end();
        logger.error("消息发送失败", { module: "routes", chatId, error: sent.error });
        return fail(`Failed to send: ${sent.error ?? "unknown"}`);
    }

    logger.info("新回合已开始", {
        module: "routes",
        chatId,
        textLength: text.length,
        text: formatLogTextField(text, 120),
    });
    return ok("");
}

/**
 * 路由一条 chat 文本（命令或普通消息）
 */
export async function routeText(chatId: ChatRef, text: string, deps: RouteDeps): Promise<CommandResult> {
    const parsed = parseCommand(text);
    if (parsed && isKnownCommand(parsed.command)) {
        const handler = handlers[parsed.command];
        if (handler) {
            logger.debug(`命令: ${parsed.command}`, { module: "routes", chatId });
            return handler({ chatId, args: parsed.args, deps });
        }
    }

    if (!parsed && (await deps.bridge.answerWithText(chatId, text))) {
        return ok("");
    }

    return beginTurn(chatId, text, deps);
}
