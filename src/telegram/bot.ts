/**
 * panebridge: Telegram Bot 接线
 *
 * 白名单 → 按钮回调 / 文本消息 → PromptBridge 与命令路由
 */

import type { Bot, Context } from "grammy";
import { logger } from "../logger/index.js";
import { errorMessage } from "../errors.js";
import { isChatAllowed, type Config } from "../config.js";
import { DISMISS_DATA, PICK_PREFIX } from "../prompt/publisher.js";
import { routeText, type RouteDeps } from "../routes/commands.js";

// Telegram 单条消息上限 4096
export const MAX_REPLY_CHARS = 4000;

/**
 * 超长回复保留尾部（终端快照最新内容在底部）
 */
export function clampReply(text: string, max = MAX_REPLY_CHARS): string {
    return text.length > max ? `…${text.slice(text.length - max + 1)}` : text;
}

/**
 * 解析按钮数据："pick:dismiss" / "pick:<index>"
 */
export function parsePickData(data: string): { kind: "dismiss" } | { kind: "select"; index: number } | null {
    if (data === DISMISS_DATA) {
        return { kind: "dismiss" };
    }
    if (!data.startsWith(PICK_PREFIX)) {
        return null;
    }
    const raw = data.slice(PICK_PREFIX.length);
    if (!/^\d+$/.test(raw)) {
        return null;
    }
    return { kind: "select", index: Number(raw) };
}

/**
 * 注册中间件与处理器（bot 需先创建：PromptControls 依赖 bot.api）
 */
export function setupBot(bot: Bot, config: Pick<Config, "allowedChatIds">, deps: RouteDeps): Bot {
    // 白名单
    bot.use(async (ctx: Context, next) => {
        const chatId = ctx.chat?.id;
        if (chatId === undefined || !isChatAllowed(config, chatId)) {
            logger.warn("拒绝非白名单 chat", { module: "telegram", chatId });
            if (ctx.callbackQuery) {
                await ctx.answerCallbackQuery({ text: "Unauthorized" });
            }
            return;
        }
        await next();
    });

    bot.on("callback_query:data", async (ctx) => {
        const pick = parsePickData(ctx.callbackQuery.data);
        if (!pick) {
            await ctx.answerCallbackQuery({ text: "Unknown action" });
            return;
        }

        if (pick.kind === "dismiss") {
            await deps.bridge.dismiss();
            await ctx.answerCallbackQuery({ text: "Dismissed" });
            return;
        }

        const messageId = ctx.callbackQuery.message?.message_id;
        const result = await deps.bridge.select(pick.index, messageId);
        if (result.ok) {
            await ctx.answerCallbackQuery({ text: `Selected: ${result.label}`.slice(0, 200) });
            return;
        }
        await ctx.answerCallbackQuery();
        await ctx.reply(result.message);
    });

    bot.on("message:text", async (ctx) => {
        const chatId = ctx.chat.id;
        const result = await routeText(chatId, ctx.message.text, deps);
        if (result.message) {
            await ctx.reply(clampReply(result.message));
        }
    });

    bot.catch((err) => {
        logger.error("Telegram 处理失败", {
            module: "telegram",
            updateId: err.ctx.update.update_id,
            error: errorMessage(err.error),
        });
    });

    return bot;
}
