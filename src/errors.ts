/**
 * panebridge: 错误类
 */

export type BridgeErrorCode =
    | "CONFIG_INVALID"
    | "CONFIG_MISSING_TOKEN"
    | "TMUX_SESSION_MISSING"
    | "TMUX_COMMAND_FAILED";

/**
 * 桥接层错误（code 用于日志与回复分流）
 */
export class BridgeError extends Error {
    constructor(
        public code: BridgeErrorCode,
        message: string
    ) {
        super(message);
        this.name = "BridgeError";
    }
}

/**
 * 取错误消息（catch 到的值不一定是 Error）
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
