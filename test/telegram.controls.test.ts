/**
 * panebridge: Telegram 按键消息测试
 */

import { describe, expect, test } from "vitest";
import type { InlineKeyboardMarkup } from "grammy/types";
import { TelegramControls, buildKeyboard, type ChatApi } from "../src/telegram/controls.js";
import { clampReply, parsePickData } from "../src/telegram/bot.js";
import type { PromptMessage } from "../src/prompt/publisher.js";

const MESSAGE: PromptMessage = {
    text: "Proceed with changes?",
    buttons: [
        { text: "1. Yes", data: "pick:0" },
        { text: "--- Dismiss (Escape) ---", data: "pick:dismiss" },
    ],
};

class FakeApi implements ChatApi {
    readonly sent: Array<{ chatId: number; text: string; markup?: InlineKeyboardMarkup }> = [];
    readonly edited: Array<{ chatId: number; messageId: number; text: string; markup?: InlineKeyboardMarkup }> = [];

    async sendMessage(chatId: number, text: string, other?: { reply_markup?: InlineKeyboardMarkup }) {
        this.sent.push({ chatId, text, markup: other?.reply_markup });
        return { message_id: 77 };
    }

    async editMessageText(chatId: number, messageId: number, text: string, other?: { reply_markup?: InlineKeyboardMarkup }) {
        this.edited.push({ chatId, messageId, text, markup: other?.reply_markup });
        return true;
    }

    async sendChatAction() {
        return true;
    }
}

describe("buildKeyboard", () => {
    test("每个按钮一行", () => {
        expect(buildKeyboard(MESSAGE).inline_keyboard).toEqual([
            [{ text: "1. Yes", callback_data: "pick:0" }],
            [{ text: "--- Dismiss (Escape) ---", callback_data: "pick:dismiss" }],
        ]);
    });
});

describe("TelegramControls", () => {
    test("publish 返回消息 id", async () => {
        const api = new FakeApi();
        const controls = new TelegramControls(api);

        expect(await controls.publish(5, MESSAGE)).toBe(77);
        expect(api.sent[0]?.text).toBe("Proceed with changes?");
        expect(api.sent[0]?.markup?.inline_keyboard).toHaveLength(2);
    });

    test("retract 改写文本并清空键盘", async () => {
        const api = new FakeApi();
        await new TelegramControls(api).retract(5, 77, "Selected: 1. Yes");

        expect(api.edited).toEqual([
            { chatId: 5, messageId: 77, text: "Selected: 1. Yes", markup: { inline_keyboard: [] } },
        ]);
    });
});

describe("parsePickData", () => {
    test("dismiss / 下标 / 其他", () => {
        expect(parsePickData("pick:dismiss")).toEqual({ kind: "dismiss" });
        expect(parsePickData("pick:3")).toEqual({ kind: "select", index: 3 });
        expect(parsePickData("pick:-1")).toBeNull();
        expect(parsePickData("other")).toBeNull();
    });
});

describe("clampReply", () => {
    test("保留尾部", () => {
        expect(clampReply("abcdef", 4)).toBe("…def");
        expect(clampReply("abcd", 4)).toBe("abcd");
    });
});
