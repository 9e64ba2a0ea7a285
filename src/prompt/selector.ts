/**
 * panebridge: 选项 → 按键序列
 *
 * 宿主 CLI 只认方向键 + Enter，按当前高亮项计算相对位移。
 */

import { setTimeout as sleep } from "node:timers/promises";
import type { KeySink, TerminalKey } from "./types.js";

export interface KeyDelays {
    /** 两次方向键之间（宿主 CLI 轮询输入的节奏） */
    stepMs: number;
    /** 最后一次方向键到 Enter */
    settleMs: number;
}

export const DEFAULT_KEY_DELAYS: KeyDelays = {
    stepMs: 50,
    settleMs: 100,
};

/**
 * 只做移动、不确认
 */
export function planMoves(targetIndex: number, currentIndex: number): TerminalKey[] {
    const delta = targetIndex - currentIndex;
    const key: TerminalKey = delta > 0 ? "Down" : "Up";
    return Array.from({ length: Math.abs(delta) }, () => key);
}

/**
 * select(5, 2) → Down ×3 + Enter
 */
export function planSelection(targetIndex: number, currentIndex: number): TerminalKey[] {
    return [...planMoves(targetIndex, currentIndex), "Enter"];
}

/**
 * 逐个发送方向键（不含 Enter）
 */
export async function sendMoves(
    sink: KeySink,
    targetIndex: number,
    currentIndex: number,
    delays: KeyDelays = DEFAULT_KEY_DELAYS
): Promise<void> {
    for (const key of planMoves(targetIndex, currentIndex)) {
        await sink.sendKey(key);
        await sleep(delays.stepMs);
    }
}

/**
 * 移动到目标项并确认
 *
 * currentIndex 必须是宿主 CLI 当前的真实光标位置。
 */
export async function sendSelection(
    sink: KeySink,
    targetIndex: number,
    currentIndex: number,
    delays: KeyDelays = DEFAULT_KEY_DELAYS
): Promise<void> {
    await sendMoves(sink, targetIndex, currentIndex, delays);
    await sleep(delays.settleMs);
    await sink.sendKey("Enter");
}
