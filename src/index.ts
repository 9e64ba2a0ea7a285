/**
 * panebridge: 主入口
 *
 * 原则：
 * - 单例锁：防止多个实例同时 long-poll 同一个 bot
 * - 启动时若有未结束的回合（重启前留下的），恢复监控
 */

import http from "node:http";
import { Bot, webhookCallback } from "grammy";
import { loadConfig, loadEnvFile, type Config } from "./config.js";
import { logger, setLogLevel } from "./logger/index.js";
import { BridgeError, errorMessage } from "./errors.js";
import { getVersion } from "./version.js";
import { acquireSingletonLock } from "./runtime/singleton.js";
import { TmuxSession } from "./tmux/session.js";
import { PromptState } from "./prompt/state.js";
import { PromptPublisher } from "./prompt/publisher.js";
import { PromptBridge } from "./prompt/bridge.js";
import { FilePendingTurn } from "./turn/pending.js";
import { PromptMonitor } from "./turn/monitor.js";
import { TypingIndicator } from "./turn/typing.js";
import { TelegramControls } from "./telegram/controls.js";
import { setupBot } from "./telegram/bot.js";

export { loadConfig } from "./config.js";
export { normalizeScreen } from "./prompt/normalize.js";
export { parsePrompt } from "./prompt/parser.js";
export { promptFingerprint } from "./prompt/fingerprint.js";
export { planSelection } from "./prompt/selector.js";
export { PromptBridge } from "./prompt/bridge.js";
export type { ParsedPrompt, PromptOption } from "./prompt/types.js";

function printBanner(config: Config): void {
    console.log(`
panebridge v${getVersion()}
`);
    console.log(`配置:`);
    console.log(`  tmux 会话: ${config.tmuxSession}`);
    console.log(`  模式: ${config.mode}${config.mode === "webhook" ? ` (port ${config.port})` : ""}`);
    console.log(`  白名单 chat: ${config.allowedChatIds.length || "不限制"}`);
    console.log(`  日志级别: ${config.logLevel}`);
    console.log("");
}

/**
 * webhook 模式：POST 交给 grammY，GET 返回 banner
 */
function serveWebhook(bot: Bot, port: number): http.Server {
    const handleUpdate = webhookCallback(bot, "http");
    const server = http.createServer((req, res) => {
        if (req.method !== "POST") {
            res.writeHead(200, { "Content-Type": "text/plain" });
            res.end(`panebridge v${getVersion()} running`);
            return;
        }
        handleUpdate(req, res).catch((error: unknown) => {
            logger.error("webhook 处理失败", { module: "main", error: errorMessage(error) });
            if (!res.headersSent) {
                res.writeHead(500);
            }
            res.end();
        });
    });
    server.listen(port, () => {
        logger.info("webhook HTTP 已启动", { module: "main", port });
    });
    return server;
}

export async function startBridge(): Promise<void> {
    loadEnvFile();
    const config = loadConfig();
    // logger 在 .env 加载前已创建
    setLogLevel(config.logLevel);
    if (!config.botToken) {
        throw new BridgeError("CONFIG_MISSING_TOKEN", "TELEGRAM_BOT_TOKEN 未设置");
    }

    const lock = await acquireSingletonLock("panebridge");
    if (!lock.acquired) {
        console.error(`[panebridge] 已有实例在运行 (pid=${lock.pid ?? "unknown"})，本次启动取消`);
        console.error(`如需重启，请先运行: kill ${lock.pid ?? "<pid>"}`);
        process.exit(1);
    }

    printBanner(config);

    const bot = new Bot(config.botToken);
    const tmux = new TmuxSession(config.tmuxSession);
    const pending = new FilePendingTurn(config.pendingFile, config.turnMaxAgeSec * 1000);
    const bridge = new PromptBridge({
        state: new PromptState(),
        publisher: new PromptPublisher(new TelegramControls(bot.api)),
        pane: tmux,
        keys: tmux,
        parser: config.parser,
    });
    const monitor = new PromptMonitor(bridge, pending, { pollIntervalMs: config.promptPollMs });
    const typing = new TypingIndicator(
        chatId => bot.api.sendChatAction(chatId, "typing"),
        pending,
        config.typingIntervalMs
    );

    setupBot(bot, config, {
        bridge,
        terminal: tmux,
        pending,
        monitor,
        typing,
        sessionName: config.tmuxSession,
    });

    process.on("uncaughtException", (error) => {
        logger.error("未捕获的异常", { module: "main", error: errorMessage(error) });
        setTimeout(() => process.exit(1), 500);
    });

    process.on("unhandledRejection", (reason) => {
        logger.error("未处理的 Promise rejection", { module: "main", reason: String(reason) });
    });

    logger.info("panebridge 启动", {
        module: "main",
        mode: config.mode,
        tmuxSession: config.tmuxSession,
        allowedChats: config.allowedChatIds.length,
        tmuxRunning: await tmux.exists(),
    });

    // 重启前留下的回合
    const resumed = pending.current();
    if (resumed) {
        logger.info("恢复未结束回合的菜单监控", { module: "main", chatId: resumed.chatId });
        monitor.start(resumed.chatId);
        typing.start(resumed.chatId);
    }

    const shutdown = async (signal: string): Promise<void> => {
        logger.info(`收到 ${signal}，正在关闭`, { module: "main" });
        if (config.mode === "polling") {
            await bot.stop();
        }
        logger.close();
        process.exit(0);
    };
    process.once("SIGINT", () => void shutdown("SIGINT"));
    process.once("SIGTERM", () => void shutdown("SIGTERM"));

    if (config.mode === "webhook") {
        await bot.init();
        serveWebhook(bot, config.port);
        return;
    }

    await bot.start({
        drop_pending_updates: true,
        onStart: (me) => logger.info(`Telegram long polling 已启动 (@${me.username})`, { module: "main" }),
    });
}
