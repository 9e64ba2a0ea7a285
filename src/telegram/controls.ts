/**
 * panebridge: Telegram 按键消息
 *
 * publish：sendMessage + inline keyboard（每个按钮一行）
 * retract：editMessageText 改写为状态行，并清空键盘
 */

import { InlineKeyboard } from "grammy";
import type { InlineKeyboardMarkup } from "grammy/types";
import type { PromptControls, PromptMessage } from "../prompt/publisher.js";
import type { ChatRef, MessageRef } from "../prompt/types.js";

/**
 * 用到的 Bot API 子集（bot.api 满足；测试用替身实现）
 */
export interface ChatApi {
    sendMessage(
        chatId: number,
        text: string,
        other?: { reply_markup?: InlineKeyboardMarkup }
    ): Promise<{ message_id: number }>;
    editMessageText(
        chatId: number,
        messageId: number,
        text: string,
        other?: { reply_markup?: InlineKeyboardMarkup }
    ): Promise<unknown>;
    sendChatAction(chatId: number, action: "typing"): Promise<unknown>;
}

export function buildKeyboard(message: PromptMessage): InlineKeyboard {
    const keyboard = new InlineKeyboard();
    message.buttons.forEach((button, index) => {
        if (index > 0) {
            keyboard.row();
        }
        keyboard.text(button.text, button.data);
    });
    return keyboard;
}

export class TelegramControls implements PromptControls {
    constructor(private readonly api: ChatApi) {}

    async publish(chatId: ChatRef, message: PromptMessage): Promise<MessageRef> {
        const sent = await this.api.sendMessage(chatId, message.text, {
            reply_markup: buildKeyboard(message),
        });
        return sent.message_id;
    }

    async retract(chatId: ChatRef, messageId: MessageRef, status: string): Promise<void> {
        await this.api.editMessageText(chatId, messageId, status, {
            reply_markup: { inline_keyboard: [] },
        });
    }
}
