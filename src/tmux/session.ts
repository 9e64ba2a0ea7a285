/**
 * panebridge: tmux 会话
 *
 * 对目标 pane 的抓取与按键注入。
 *
 * 关键约束：
 * - 按键与文本用 spawn 传参，不经 shell（防注入）
 * - 文本用 send-keys -l 字面量发送，Enter 单独发送
 * - capturePane 失败返回空字符串，不抛出
 */

import { exec, spawn } from "node:child_process";
import { promisify } from "node:util";

import { logger } from "../logger/index.js";
import { BridgeError, errorMessage } from "../errors.js";
import type { KeySink, PaneSource, TerminalKey } from "../prompt/types.js";

const execAsync = promisify(exec);
const TMUX_TIMEOUT_MS = 5000;

// 会话名只允许安全字符（会拼进 exec 命令行）
const SAFE_SESSION_NAME = /^[A-Za-z0-9_.:-]+$/;

/**
 * 终端键 → tmux 键名
 */
const TMUX_KEY_NAMES: Record<TerminalKey, string> = {
    Up: "Up",
    Down: "Down",
    // C-m 比 "Enter" 字面量更可靠
    Enter: "C-m",
    Escape: "Escape",
};

export function isSafeSessionName(name: string): boolean {
    return SAFE_SESSION_NAME.test(name);
}

/**
 * tmux 目标 pane（实现 PaneSource + KeySink）
 */
export class TmuxSession implements PaneSource, KeySink {
    readonly sessionName: string;

    constructor(sessionName: string, private readonly historyLines = 0) {
        if (!isSafeSessionName(sessionName)) {
            throw new BridgeError("TMUX_SESSION_MISSING", `非法的 tmux 会话名: ${sessionName}`);
        }
        this.sessionName = sessionName;
    }

    /**
     * 会话是否存在
     */
    async exists(): Promise<boolean> {
        try {
            await execAsync(`tmux has-session -t ${this.sessionName}`, { timeout: 2000 });
            return true;
        } catch {
            return false;
        }
    }

    /**
     * 列出所有 tmux 会话名（tmux 未运行时返回空数组）
     */
    static async listSessions(): Promise<string[]> {
        try {
            const { stdout } = await execAsync(`tmux list-sessions -F "#{session_name}"`, { timeout: TMUX_TIMEOUT_MS });
            return stdout.split("\n").map(s => s.trim()).filter(Boolean);
        } catch {
            return [];
        }
    }

    /**
     * 抓取可见屏幕（含 ANSI 转义，由 normalizeScreen 清理）
     *
     * @param lines 额外的历史行数；0 表示只抓可见区域
     */
    async capturePane(lines: number = this.historyLines): Promise<string> {
        const start = lines > 0 ? ` -S -${Math.floor(lines)}` : "";
        try {
            const { stdout } = await execAsync(
                `tmux capture-pane -t ${this.sessionName} -p -e${start}`,
                { timeout: TMUX_TIMEOUT_MS, maxBuffer: 4 * 1024 * 1024 }
            );
            return stdout;
        } catch (error) {
            logger.debug("capture-pane 失败", { module: "tmux", session: this.sessionName, error: errorMessage(error) });
            return "";
        }
    }

    capture(): Promise<string> {
        return this.capturePane();
    }

    /**
     * 发送字面量文本（-l：不解释特殊字符）
     */
    async sendText(text: string): Promise<void> {
        await this.sendKeys(["-l", text]);
    }

    async sendKey(key: TerminalKey): Promise<void> {
        await this.sendKeys([TMUX_KEY_NAMES[key]]);
    }

    /**
     * tmux send-keys（spawn 传参 + 超时）
     */
    private sendKeys(args: string[]): Promise<void> {
        const argv = ["send-keys", "-t", this.sessionName, ...args];
        return new Promise((resolve, reject) => {
            let settled = false;
            const proc = spawn("tmux", argv);

            const timeoutId = setTimeout(() => {
                if (!settled && !proc.killed) {
                    proc.kill();
                    settled = true;
                    reject(new BridgeError("TMUX_COMMAND_FAILED", "tmux send-keys timeout"));
                }
            }, TMUX_TIMEOUT_MS);

            proc.on("close", (code: number | null) => {
                clearTimeout(timeoutId);
                if (settled) return;
                settled = true;
                if (code === 0) {
                    resolve();
                } else {
                    reject(new BridgeError("TMUX_COMMAND_FAILED", `tmux send-keys exited with code ${code}`));
                }
            });

            proc.on("error", (err: Error) => {
                clearTimeout(timeoutId);
                if (settled) return;
                settled = true;
                reject(new BridgeError("TMUX_COMMAND_FAILED", `tmux send-keys failed: ${err.message}`));
            });
        });
    }
}
