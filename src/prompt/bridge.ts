/**
 * panebridge: 交互式菜单桥
 *
 * 监控循环调用 reconcile / teardown；按钮回调与命令调用 select / dismiss / pick / interrupt；
 * 普通消息先走 answerWithText。
 *
 * 并发约束：
 * - PromptState 的读-改-写全部在 state.withLock 内
 * - 认领（select 等）只在锁内解绑消息、保留指纹，按键注入与撤回在锁外；
 *   认领结束前菜单暂时从屏幕消失也不清空指纹
 * - reconcile 的撤回/发布在锁内，保证同一时刻最多一条按键消息
 */

import { setTimeout as sleep } from "node:timers/promises";
import { logger } from "../logger/index.js";
import { formatLogTextField } from "../logger/format-text.js";
import { errorMessage } from "../errors.js";
import { normalizeScreen } from "./normalize.js";
import { isMenuFooter, parsePrompt, type ParserOptions } from "./parser.js";
import { promptFingerprint } from "./fingerprint.js";
import { PromptState } from "./state.js";
import { PromptPublisher, PromptStatus, findPlaceholderIndex } from "./publisher.js";
import { DEFAULT_KEY_DELAYS, sendMoves, sendSelection, type KeyDelays } from "./selector.js";
import type { ChatRef, KeySink, MessageRef, PaneSource, ParsedPrompt, PromptOption } from "./types.js";

/**
 * 单次 reconcile 的结果
 *
 * - skipped：快照为空（抓取失败），状态不动
 * - none：屏幕上没有菜单，也没有绑定
 * - resolved：菜单消失，已撤回
 * - unchanged：同一菜单，原地更新
 * - published：新菜单，已发布
 */
export type ReconcileOutcome = "skipped" | "none" | "resolved" | "unchanged" | "published";

export type SelectionResult =
    | { ok: true; label: string }
    | { ok: false; reason: "stale" | "failed"; message: string };

export type PickResult =
    | { ok: true; tracked: boolean; index: number; label?: string }
    | { ok: false; message: string };

export interface PromptBridgeDeps {
    state: PromptState;
    publisher: PromptPublisher;
    pane: PaneSource;
    keys: KeySink;
    parser?: ParserOptions;
    keyDelays?: KeyDelays;
    /** 自由输入前等待菜单切换的时间 */
    typeSettleMs?: number;
    /** 发 Escape 后等待菜单关闭的时间 */
    escapeSettleMs?: number;
}

interface Claimed {
    chatId?: ChatRef;
    messageId?: MessageRef;
    options: PromptOption[];
    highlightedIndex: number;
}

export class PromptBridge {
    readonly state: PromptState;
    private readonly publisher: PromptPublisher;
    private readonly pane: PaneSource;
    private readonly keys: KeySink;
    private readonly parser: ParserOptions;
    private readonly keyDelays: KeyDelays;
    private readonly typeSettleMs: number;
    private readonly escapeSettleMs: number;

    constructor(deps: PromptBridgeDeps) {
        this.state = deps.state;
        this.publisher = deps.publisher;
        this.pane = deps.pane;
        this.keys = deps.keys;
        this.parser = deps.parser ?? {};
        this.keyDelays = deps.keyDelays ?? DEFAULT_KEY_DELAYS;
        this.typeSettleMs = deps.typeSettleMs ?? 200;
        this.escapeSettleMs = deps.escapeSettleMs ?? 500;
    }

    /**
     * 抓取并解析当前 pane；快照为空时 captured=false
     */
    async detect(): Promise<{ captured: boolean; prompt: ParsedPrompt | null }> {
        const raw = await this.pane.capture();
        if (!raw.trim()) {
            return { captured: false, prompt: null };
        }

        const text = normalizeScreen(raw);
        const prompt = parsePrompt(text, this.parser);
        if (!prompt && text.split("\n").slice(-8).some(line => isMenuFooter(line.trim()))) {
            logger.debug("检测到菜单 footer 但解析失败", { module: "prompt-bridge", lineCount: text.split("\n").length });
        }
        return { captured: true, prompt };
    }

    /**
     * 对齐 PromptState 与屏幕（一次 tick）
     */
    async reconcile(chatId: ChatRef): Promise<ReconcileOutcome> {
        const { captured, prompt } = await this.detect();
        if (!captured) {
            logger.debug("pane 快照为空，跳过本次 tick", { module: "prompt-bridge", chatId });
            return "skipped";
        }

        return this.state.withLock(async (state): Promise<ReconcileOutcome> => {
            if (!prompt) {
                let outcome: ReconcileOutcome = "none";
                if (state.hasBoundControl()) {
                    await this.publisher.retract(state.boundChat, state.boundMessage, PromptStatus.Resolved);
                    outcome = "resolved";
                }
                if (!state.hasClaimInFlight()) {
                    state.clear();
                }
                return outcome;
            }

            const fingerprint = promptFingerprint(prompt);
            if (fingerprint === state.fingerprint) {
                // 重绘（光标移动、描述折行变化）
                state.options = prompt.options;
                state.highlightedIndex = prompt.highlightedIndex;
                return "unchanged";
            }

            if (state.hasBoundControl()) {
                await this.publisher.retract(state.boundChat, state.boundMessage, PromptStatus.Superseded);
            }

            const messageId = await this.publisher.publish(chatId, prompt);
            // 发布失败也更新状态，避免下一 tick 重复发送
            state.fingerprint = fingerprint;
            state.boundChat = chatId;
            state.boundMessage = messageId;
            state.options = prompt.options;
            state.highlightedIndex = prompt.highlightedIndex;

            logger.debug("菜单状态已更新", {
                module: "prompt-bridge",
                chatId,
                messageId,
                fingerprint,
                question: formatLogTextField(prompt.question, 80),
            });
            return "published";
        });
    }

    /**
     * 回合结束：撤回仍绑定的按键消息并清空状态（不看指纹）
     *
     * @returns 是否撤回了消息
     */
    async teardown(status: string = PromptStatus.Completed): Promise<boolean> {
        return this.state.withLock(async (state) => {
            let retracted = false;
            if (state.hasBoundControl()) {
                await this.publisher.retract(state.boundChat, state.boundMessage, status);
                retracted = true;
            }
            state.clear();
            return retracted;
        });
    }

    /**
     * 按钮选择
     *
     * messageId 为按钮所在消息；与当前绑定不一致时视为过期。
     */
    async select(index: number, messageId?: MessageRef): Promise<SelectionResult> {
        const claimed = await this.state.withLock((state): Claimed | string => {
            const count = state.options.length;
            if (state.boundMessage === undefined || (messageId !== undefined && messageId !== state.boundMessage)) {
                return `Prompt may have changed (options=${count}, target=${index}). Use /screenshot to check.`;
            }
            if (!Number.isInteger(index) || index < 0 || index >= count) {
                return `Prompt may have changed (options=${count}, target=${index}). Use /screenshot to check.`;
            }
            return state.claim();
        });

        if (typeof claimed === "string") {
            logger.info("选择已过期", { module: "prompt-bridge", messageId, index });
            return { ok: false, reason: "stale", message: claimed };
        }

        const label = claimed.options[index]?.label ?? String(index);
        logger.info(`选择选项 ${index}`, {
            module: "prompt-bridge",
            messageId: claimed.messageId,
            index,
            highlightedIndex: claimed.highlightedIndex,
            label: formatLogTextField(label, 60),
        });

        try {
            await sendSelection(this.keys, index, claimed.highlightedIndex, this.keyDelays);
        } catch (error) {
            logger.error("选择按键发送失败", { module: "prompt-bridge", error: errorMessage(error) });
            await this.finishClaim(true);
            await this.retractClaimed(claimed, `Selection failed: ${label}`);
            return { ok: false, reason: "failed", message: `Failed to send keys: ${errorMessage(error)}` };
        }

        await this.finishClaim();
        await this.retractClaimed(claimed, `Selected: ${label}`);
        return { ok: true, label };
    }

    /**
     * 关闭菜单（Escape）
     *
     * 只认领不清空：菜单消失后由下一次 tick 清空状态。
     */
    async dismiss(): Promise<void> {
        const claimed = await this.state.withLock(state => state.claim());

        let failed = false;
        try {
            await this.keys.sendKey("Escape");
        } catch (error) {
            logger.error("Escape 发送失败", { module: "prompt-bridge", error: errorMessage(error) });
            failed = true;
        }
        await this.finishClaim(failed);
        await this.retractClaimed(claimed, PromptStatus.Dismissed);
    }

    /**
     * 用户直接发文字：屏幕上有菜单时作为自由输入回答
     *
     * 有占位项（Type something）时移动过去直接打字；没有时 Escape 后当普通消息发送。
     *
     * @returns 文字是否已被菜单消费
     */
    async answerWithText(chatId: ChatRef, text: string): Promise<boolean> {
        const outcome = await this.reconcile(chatId);
        if (outcome !== "published" && outcome !== "unchanged") {
            return false;
        }

        const claimed = await this.state.withLock((state) => {
            const snapshot = state.claim();
            state.boundChat = undefined;
            return snapshot;
        });

        const placeholder = findPlaceholderIndex(claimed.options);
        logger.info("自由输入回答菜单", {
            module: "prompt-bridge",
            chatId,
            placeholder,
            textLength: text.length,
        });

        try {
            if (placeholder >= 0) {
                // 只移动不确认：宿主 CLI 在占位项上直接进入输入模式
                await sendMoves(this.keys, placeholder, claimed.highlightedIndex, this.keyDelays);
                await sleep(this.typeSettleMs);
            } else {
                await this.keys.sendKey("Escape");
                await sleep(this.escapeSettleMs);
            }
            await this.keys.sendText(text);
            await this.keys.sendKey("Enter");
            await this.finishClaim();
        } catch (error) {
            logger.error("自由输入发送失败", { module: "prompt-bridge", chatId, error: errorMessage(error) });
            await this.finishClaim(true);
        }

        await this.retractClaimed(claimed, `Custom answer: ${text.slice(0, 40)}`);
        return true;
    }

    /**
     * /pick N：有跟踪的菜单时按相对位移选择，否则从第 0 项盲选
     */
    async pick(index: number): Promise<PickResult> {
        if (!Number.isInteger(index) || index < 0) {
            return { ok: false, message: "Usage: /pick <number> (0-based index)" };
        }

        const claimed = await this.state.withLock((state): Claimed | string | null => {
            if (state.options.length === 0) {
                return null;
            }
            if (index >= state.options.length) {
                return `Index out of range. Valid: 0-${state.options.length - 1}`;
            }
            return state.claim();
        });

        if (typeof claimed === "string") {
            return { ok: false, message: claimed };
        }

        try {
            if (!claimed) {
                await sendSelection(this.keys, index, 0, this.keyDelays);
                return { ok: true, tracked: false, index };
            }

            const label = claimed.options[index]?.label ?? String(index);
            await sendSelection(this.keys, index, claimed.highlightedIndex, this.keyDelays);
            await this.finishClaim();
            await this.retractClaimed(claimed, `Selected: ${label}`);
            return { ok: true, tracked: true, index, label };
        } catch (error) {
            logger.error("/pick 按键发送失败", { module: "prompt-bridge", error: errorMessage(error) });
            if (claimed) {
                await this.finishClaim(true);
            }
            return { ok: false, message: `Failed to send keys: ${errorMessage(error)}` };
        }
    }

    /**
     * /stop：撤回并清空
     */
    async interrupt(): Promise<void> {
        const claimed = await this.state.withLock((state) => {
            const snapshot = state.claim();
            state.releaseClaim();
            state.clear();
            return snapshot;
        });
        await this.retractClaimed(claimed, PromptStatus.Interrupted);
    }

    /**
     * 结束认领；按键没发出去时丢掉保留的指纹，让下一次 tick 重新发布
     */
    private async finishClaim(failed = false): Promise<void> {
        await this.state.withLock((state) => {
            state.releaseClaim();
            if (failed && state.boundMessage === undefined) {
                state.fingerprint = undefined;
            }
        });
    }

    private async retractClaimed(claimed: Claimed, status: string): Promise<void> {
        if (claimed.chatId !== undefined && claimed.messageId !== undefined) {
            await this.publisher.retract(claimed.chatId, claimed.messageId, status);
        }
    }
}
