/**
 * panebridge: typing 指示
 *
 * 回合待响应期间定期发送 typing 动作（Telegram 的 typing 状态约 5 秒失效）。
 */

import { setTimeout as sleep } from "node:timers/promises";
import { logger } from "../logger/index.js";
import { errorMessage } from "../errors.js";
import type { ChatRef } from "../prompt/types.js";
import type { PendingTurnStore } from "./pending.js";

export type TypingAction = (chatId: ChatRef) => Promise<unknown>;

export class TypingIndicator {
    private running = false;
    private worker: Promise<void> = Promise.resolve();

    constructor(
        private readonly sendTyping: TypingAction,
        private readonly pending: PendingTurnStore,
        private readonly intervalMs = 4000
    ) {}

    isRunning(): boolean {
        return this.running;
    }

    start(chatId: ChatRef): boolean {
        if (this.running) {
            return false;
        }
        this.running = true;
        this.worker = this.run(chatId);
        return true;
    }

    idle(): Promise<void> {
        return this.worker;
    }

    private async run(chatId: ChatRef): Promise<void> {
        try {
            while (this.pending.isPending()) {
                try {
                    await this.sendTyping(chatId);
                } catch (error) {
                    logger.debug("typing 发送失败", { module: "typing", chatId, error: errorMessage(error) });
                }
                await sleep(this.intervalMs);
            }
        } finally {
            this.running = false;
        }
    }
}
