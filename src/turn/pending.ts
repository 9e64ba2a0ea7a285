/**
 * panebridge: 待响应回合标记
 *
 * 用户消息送进 pane 后置位，宿主 CLI 的完成 hook（panebridge turn-done）清除。
 * 文件形式存放，供外部进程读写。
 */

import fs from "node:fs";
import path from "node:path";
import { logger } from "../logger/index.js";
import { errorMessage } from "../errors.js";
import type { ChatRef } from "../prompt/types.js";

export interface PendingTurn {
    chatId: ChatRef;
    /** 毫秒时间戳 */
    startedAt: number;
}

export interface PendingTurnStore {
    isPending(): boolean;
    begin(chatId: ChatRef): void;
    end(): void;
    /** 当前未过期的回合 */
    current(): PendingTurn | undefined;
}

function isPendingTurn(value: unknown): value is PendingTurn {
    if (typeof value !== "object" || value === null) return false;
    const chatId: unknown = Reflect.get(value, "chatId");
    const startedAt: unknown = Reflect.get(value, "startedAt");
    return typeof chatId === "number" && Number.isInteger(chatId) && typeof startedAt === "number";
}

/**
 * 文件标记（过期视为不存在）
 */
export class FilePendingTurn implements PendingTurnStore {
    constructor(
        private readonly filePath: string,
        private readonly maxAgeMs: number,
        private readonly now: () => number = Date.now
    ) {}

    isPending(): boolean {
        return this.current() !== undefined;
    }

    begin(chatId: ChatRef): void {
        const turn: PendingTurn = { chatId, startedAt: this.now() };
        fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
        fs.writeFileSync(this.filePath, JSON.stringify(turn), "utf-8");
    }

    end(): void {
        fs.rmSync(this.filePath, { force: true });
    }

    current(): PendingTurn | undefined {
        let raw: string;
        try {
            raw = fs.readFileSync(this.filePath, "utf-8");
        } catch {
            return undefined;
        }

        let parsed: unknown;
        try {
            parsed = JSON.parse(raw);
        } catch (error) {
            logger.warn("待响应标记损坏，已忽略", { module: "pending", error: errorMessage(error) });
            return undefined;
        }
        if (!isPendingTurn(parsed)) {
            return undefined;
        }
        if (this.now() - parsed.startedAt > this.maxAgeMs) {
            return undefined;
        }
        return parsed;
    }
}

/**
 * 内存标记（测试 / 单进程）
 */
export class MemoryPendingTurn implements PendingTurnStore {
    private turn: PendingTurn | undefined;

    constructor(
        private readonly maxAgeMs = Number.POSITIVE_INFINITY,
        private readonly now: () => number = Date.now
    ) {}

    isPending(): boolean {
        return this.current() !== undefined;
    }

    begin(chatId: ChatRef): void {
        this.turn = { chatId, startedAt: this.now() };
    }

    end(): void {
        this.turn = undefined;
    }

    current(): PendingTurn | undefined {
        if (this.turn && this.now() - this.turn.startedAt > this.maxAgeMs) {
            return undefined;
        }
        return this.turn;
    }
}
