/**
 * panebridge: 菜单状态
 *
 * 记录当前发布到 chat 的按键消息。监控循环与按钮回调都会改写它，
 * 所有读-改-写都必须在 withLock 内完成。
 */

import { Mutex } from "../runtime/mutex.js";
import type { ChatRef, MessageRef, PromptOption } from "./types.js";

/**
 * 状态字段（与锁分离，便于测试直接构造）
 */
export interface PromptStateFields {
    fingerprint?: string;
    boundChat?: ChatRef;
    boundMessage?: MessageRef;
    options: PromptOption[];
    highlightedIndex: number;
}

export class PromptState implements PromptStateFields {
    fingerprint?: string;
    boundChat?: ChatRef;
    boundMessage?: MessageRef;
    options: PromptOption[] = [];
    highlightedIndex = 0;

    private readonly mutex = new Mutex();
    // 尚未结束的认领数（不随 clear 归零）
    private claims = 0;

    constructor(initial: Partial<PromptStateFields> = {}) {
        Object.assign(this, initial);
    }

    /**
     * 在互斥锁内执行（临界区内不要再次调用 withLock，会死锁）
     */
    withLock<T>(fn: (state: PromptState) => Promise<T> | T): Promise<T> {
        return this.mutex.runExclusive(() => fn(this));
    }

    /**
     * 是否有可撤回的按键消息
     */
    hasBoundControl(): this is PromptState & { boundChat: ChatRef; boundMessage: MessageRef } {
        return this.boundChat !== undefined && this.boundMessage !== undefined;
    }

    /**
     * 是否有认领方还在注入按键
     */
    hasClaimInFlight(): boolean {
        return this.claims > 0;
    }

    /**
     * 全部清空
     */
    clear(): void {
        this.fingerprint = undefined;
        this.boundChat = undefined;
        this.boundMessage = undefined;
        this.options = [];
        this.highlightedIndex = 0;
    }

    /**
     * 认领：解绑消息、清空选项，但保留指纹
     *
     * 保留指纹让并发的监控 tick 看到"同一菜单、无绑定消息"，既不撤回也不重发。
     * 认领方处理完后调用 releaseClaim。
     */
    claim(): { chatId?: ChatRef; messageId?: MessageRef; options: PromptOption[]; highlightedIndex: number } {
        const claimed = {
            chatId: this.boundChat,
            messageId: this.boundMessage,
            options: this.options.map(option => ({ ...option })),
            highlightedIndex: this.highlightedIndex,
        };
        this.boundMessage = undefined;
        this.options = [];
        this.claims++;
        return claimed;
    }

    releaseClaim(): void {
        if (this.claims > 0) {
            this.claims--;
        }
    }

    /**
     * 当前字段的拷贝
     */
    snapshot(): PromptStateFields {
        return {
            fingerprint: this.fingerprint,
            boundChat: this.boundChat,
            boundMessage: this.boundMessage,
            options: this.options.map(option => ({ ...option })),
            highlightedIndex: this.highlightedIndex,
        };
    }
}
