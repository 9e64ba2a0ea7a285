/**
 * panebridge: 消息发送器
 *
 * 将用户消息作为一次新回合发送到宿主 CLI (tmux)
 */

import { setTimeout as sleep } from "node:timers/promises";
import { errorMessage } from "../errors.js";
import { normalizeScreen } from "../prompt/normalize.js";
import type { KeySink, PaneSource } from "../prompt/types.js";

/**
 * 发送目标（TmuxSession 或测试替身）
 */
export interface TerminalTarget extends KeySink, PaneSource {
    exists(): Promise<boolean>;
    /** 抓取可见区域 + lines 行历史 */
    capturePane(lines: number): Promise<string>;
}

/**
 * 消息发送结果
 */
export interface SendResult {
    success: boolean;
    error?: string;
}

export interface SendOptions {
    /** 发送文本和 Enter 之间的延迟（防止 UI 吞键） */
    enterDelayMs?: number;
    /** 超过该长度视为长消息（宿主 CLI 需要更久来接收粘贴） */
    longMessageChars?: number;
    longMessageDelayMs?: number;
}

/**
 * 发送消息（字面量 + Enter）
 */
export async function sendMessage(
    target: TerminalTarget,
    message: string,
    options: SendOptions = {}
): Promise<SendResult> {
    if (!(await target.exists())) {
        return { success: false, error: "tmux session not found" };
    }

    const longChars = options.longMessageChars ?? 200;
    const delayMs = message.length > longChars
        ? options.longMessageDelayMs ?? 500
        : options.enterDelayMs ?? 50;

    try {
        await target.sendText(message);
        await sleep(delayMs);
        await target.sendKey("Enter");
        return { success: true };
    } catch (error) {
        return { success: false, error: errorMessage(error) };
    }
}

/**
 * 终端快照：规范化后的最后 N 行
 *
 * @param nonEmptyOnly 只保留非空行（/screenshot）；/scroll 保留原样
 */
export async function captureTail(
    target: Pick<TerminalTarget, "capturePane">,
    lines: number,
    nonEmptyOnly = false
): Promise<string> {
    const raw = await target.capturePane(lines);
    let all = normalizeScreen(raw).split("\n").map(line => line.trimEnd());
    if (nonEmptyOnly) {
        all = all.filter(line => line.trim());
    } else {
        while (all.length > 0 && !all[all.length - 1]) {
            all.pop();
        }
    }
    return all.slice(-lines).join("\n");
}
