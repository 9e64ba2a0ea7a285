/**
 * panebridge: 回合结束（宿主 CLI 的 Stop hook → panebridge turn-done）
 *
 * 流程：
 * 1. 没有未过期的回合：只清理标记（不是从 chat 发起的）
 * 2. 有 transcript：把最后的回复发回发起回合的 chat（先发 HTML，被拒时改发纯文本）
 * 3. 清除待响应标记（监控循环随后 teardown）
 */

import { readFile } from "node:fs/promises";
import { logger } from "../logger/index.js";
import { errorMessage } from "../errors.js";
import type { ChatRef } from "../prompt/types.js";
import type { PendingTurnStore } from "./pending.js";
import { extractLastResponse } from "./transcript.js";
import { toTelegramHtml } from "./markdown.js";

export const MAX_RESPONSE_CHARS = 4000;

export interface CompleteTurnDeps {
    pending: PendingTurnStore;
    /** 不传则不回传回复 */
    send?: (chatId: ChatRef, text: string, parseMode?: "HTML") => Promise<unknown>;
    readTranscript?: (filePath: string) => Promise<string>;
}

export type CompleteTurnResult = "no-turn" | "ended" | "replied";

export function clampResponse(text: string, max = MAX_RESPONSE_CHARS): string {
    return text.length > max ? `${text.slice(0, max)}\n...` : text;
}

export async function completeTurn(transcriptPath: string | undefined, deps: CompleteTurnDeps): Promise<CompleteTurnResult> {
    const turn = deps.pending.current();
    if (!turn) {
        deps.pending.end();
        return "no-turn";
    }

    let result: CompleteTurnResult = "ended";
    if (transcriptPath && deps.send) {
        try {
            const read = deps.readTranscript ?? ((file: string) => readFile(file, "utf-8"));
            const response = extractLastResponse(await read(transcriptPath));
            if (response) {
                const reply = clampResponse(response);
                try {
                    await deps.send(turn.chatId, toTelegramHtml(reply), "HTML");
                } catch (error) {
                    logger.warn("HTML 回复被拒，改发纯文本", { module: "turn", chatId: turn.chatId, error: errorMessage(error) });
                    await deps.send(turn.chatId, reply);
                }
                result = "replied";
            }
        } catch (error) {
            logger.error("回复回传失败", { module: "turn", chatId: turn.chatId, error: errorMessage(error) });
        }
    }

    deps.pending.end();
    return result;
}
