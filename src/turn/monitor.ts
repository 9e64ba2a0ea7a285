/**
 * panebridge: 菜单监控循环
 *
 * 状态：Idle → Running → Idle
 * 回合待响应期间每 pollIntervalMs 调一次 reconcile；回合结束后 teardown。
 */

import { setTimeout as sleep } from "node:timers/promises";
import { logger } from "../logger/index.js";
import { errorMessage } from "../errors.js";
import { PromptStatus } from "../prompt/publisher.js";
import type { PromptBridge } from "../prompt/bridge.js";
import type { ChatRef } from "../prompt/types.js";
import type { PendingTurnStore } from "./pending.js";

export interface PromptMonitorOptions {
    /** 首次 tick 前等待（让宿主 CLI 先处理输入） */
    initialDelayMs?: number;
    pollIntervalMs?: number;
}

export class PromptMonitor {
    private running = false;
    private worker: Promise<void> = Promise.resolve();
    private readonly initialDelayMs: number;
    private readonly pollIntervalMs: number;

    constructor(
        private readonly bridge: PromptBridge,
        private readonly pending: PendingTurnStore,
        options: PromptMonitorOptions = {}
    ) {
        this.initialDelayMs = options.initialDelayMs ?? 500;
        this.pollIntervalMs = options.pollIntervalMs ?? 500;
    }

    isRunning(): boolean {
        return this.running;
    }

    /**
     * 启动监控；已在运行时直接返回 false
     */
    start(chatId: ChatRef): boolean {
        if (this.running) {
            return false;
        }
        this.running = true;
        this.worker = this.run(chatId);
        logger.debug("菜单监控已启动", { module: "monitor", chatId });
        return true;
    }

    /**
     * 等待当前 worker 退出
     */
    idle(): Promise<void> {
        return this.worker;
    }

    private async run(chatId: ChatRef): Promise<void> {
        let target = chatId;
        try {
            await sleep(this.initialDelayMs);
            for (;;) {
                while (this.pending.isPending()) {
                    await this.tick(target);
                    await sleep(this.pollIntervalMs);
                }

                try {
                    await this.bridge.teardown(PromptStatus.Completed);
                } catch (error) {
                    logger.error("菜单收尾失败", { module: "monitor", chatId: target, error: errorMessage(error) });
                }

                // 收尾期间新回合已开始（start 被 running 挡住），继续跑
                const next = this.pending.current();
                if (!next) {
                    break;
                }
                target = next.chatId;
            }
        } finally {
            this.running = false;
            logger.debug("菜单监控已退出", { module: "monitor", chatId: target });
        }
    }

    private async tick(chatId: ChatRef): Promise<void> {
        try {
            await this.bridge.reconcile(chatId);
        } catch (error) {
            logger.error("菜单监控 tick 失败", { module: "monitor", chatId, error: errorMessage(error) });
        }
    }
}
