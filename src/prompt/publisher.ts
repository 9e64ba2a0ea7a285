/**
 * panebridge: 菜单发布器
 *
 * 把解析出的菜单渲染成 chat 消息 + 按钮，撤回时改写为状态行。
 * 具体平台（Telegram）由 PromptControls 实现。
 */

import { logger } from "../logger/index.js";
import { errorMessage } from "../errors.js";
import type { ChatRef, MessageRef, ParsedPrompt, PromptOption } from "./types.js";

/**
 * 撤回状态文案
 */
export const PromptStatus = {
    Resolved: "Prompt was resolved",
    Superseded: "Previous prompt superseded",
    Completed: "Request completed",
    Dismissed: "Dismissed (Escape sent)",
    Interrupted: "Interrupted by /stop",
} as const;

export const DISMISS_DATA = "pick:dismiss";
export const PICK_PREFIX = "pick:";
export const MAX_BUTTON_LABEL = 60;

// 选中后宿主 CLI 进入自由输入，按钮上没有意义
const PLACEHOLDER_LABELS = new Set(["other", "type something", "type something else"]);

export interface PromptButton {
    text: string;
    data: string;
}

/**
 * 待发布的消息内容（平台无关）
 */
export interface PromptMessage {
    text: string;
    /** 每个按钮单独一行 */
    buttons: PromptButton[];
}

/**
 * 平台按键消息操作
 */
export interface PromptControls {
    publish(chatId: ChatRef, message: PromptMessage): Promise<MessageRef>;
    retract(chatId: ChatRef, messageId: MessageRef, status: string): Promise<void>;
}

/**
 * 是否为自由输入占位项（"3. Type something." / "Other"）
 */
export function isPlaceholderOption(label: string): boolean {
    const clean = label.replace(/^\d+[.)]\s*/, "").trim().toLowerCase().replace(/\.$/, "");
    return PLACEHOLDER_LABELS.has(clean);
}

/**
 * 第一个占位项的下标，没有时返回 -1
 */
export function findPlaceholderIndex(options: readonly PromptOption[]): number {
    return options.findIndex(option => isPlaceholderOption(option.label));
}

/**
 * 按码点截断（按 UTF-16 截断可能留下半个代理对，Telegram 会拒收）
 */
export function truncateLabel(label: string, max = MAX_BUTTON_LABEL): string {
    const chars = Array.from(label);
    return chars.length > max ? `${chars.slice(0, max).join("")}...` : label;
}

/**
 * 渲染消息：正文列出全部选项（含描述），按钮只放标签
 */
export function buildPromptMessage(prompt: ParsedPrompt): PromptMessage {
    const lines = ["Interactive prompt:", "", prompt.question, ""];
    for (const option of prompt.options) {
        lines.push(`  ${option.label}`);
        if (option.description) {
            lines.push(`    ${option.description}`);
        }
    }
    lines.push("", "Or send a message to answer in your own words.");

    const buttons: PromptButton[] = [];
    prompt.options.forEach((option, index) => {
        if (isPlaceholderOption(option.label)) {
            return;
        }
        buttons.push({ text: truncateLabel(option.label), data: `${PICK_PREFIX}${index}` });
    });
    buttons.push({ text: "--- Dismiss (Escape) ---", data: DISMISS_DATA });

    return { text: lines.join("\n"), buttons };
}

/**
 * 发布 / 撤回（失败只记日志，不抛出）
 */
export class PromptPublisher {
    constructor(private readonly controls: PromptControls) {}

    /**
     * 发布失败返回 undefined（PublishFailure）
     */
    async publish(chatId: ChatRef, prompt: ParsedPrompt): Promise<MessageRef | undefined> {
        try {
            const messageId = await this.controls.publish(chatId, buildPromptMessage(prompt));
            logger.info("菜单已发布", { module: "publisher", chatId, messageId, optionCount: prompt.options.length });
            return messageId;
        } catch (error) {
            logger.error("菜单发布失败", { module: "publisher", chatId, error: errorMessage(error) });
            return undefined;
        }
    }

    async retract(chatId: ChatRef, messageId: MessageRef, status: string): Promise<void> {
        try {
            await this.controls.retract(chatId, messageId, status);
            logger.debug(`菜单已撤回: ${status}`, { module: "publisher", chatId, messageId });
        } catch (error) {
            logger.warn("菜单撤回失败", { module: "publisher", chatId, messageId, error: errorMessage(error) });
        }
    }
}
