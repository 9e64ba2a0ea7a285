/**
 * panebridge: 控制台日志传输器
 *
 * 负责将日志输出到控制台，支持彩色格式
 */

import type { LogEntry, LogLevel, Transport, TransportOptions } from "./index.js";

export interface ConsoleTransportOptions extends TransportOptions {
    /**
     * 是否启用彩色输出
     */
    colorize?: boolean;
}

const Colors = {
    reset: "\x1b[0m",
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
    cyan: "\x1b[36m",
} as const;

const LevelColors: Record<LogLevel, string> = {
    debug: Colors.cyan,
    info: Colors.green,
    warn: Colors.yellow,
    error: Colors.red,
};

const LevelPriority: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

/**
 * 控制台日志传输器
 */
export class ConsoleTransport implements Transport {
    private colorize: boolean;
    private minLevel: LogLevel;

    constructor(options: ConsoleTransportOptions = {}) {
        this.colorize = options.colorize ?? true;
        this.minLevel = options.level ?? "debug";
    }

    write(entry: LogEntry): void {
        if (LevelPriority[entry.level] < LevelPriority[this.minLevel]) {
            return;
        }
        const write = this.getConsoleMethod(entry.level);
        write(this.format(entry));
    }

    /**
     * 格式化日志消息（带 meta 中的 error 字段，便于排障）
     */
    format(entry: LogEntry): string {
        const { timestamp, level, message, module, meta } = entry;
        const levelStr = level.toUpperCase().padEnd(5);
        const moduleStr = module ? `[${module}] ` : "";
        const errorStr = typeof meta?.error === "string" ? ` (${meta.error})` : "";

        if (!this.colorize) {
            return `${timestamp} [${levelStr}] ${moduleStr}${message}${errorStr}`;
        }

        const coloredLevel = `${LevelColors[level]}${levelStr}${Colors.reset}`;
        return `${timestamp} [${coloredLevel}] ${moduleStr}${message}${errorStr}`;
    }

    private getConsoleMethod(level: LogLevel): (message: string) => void {
        switch (level) {
            case "error":
                return console.error;
            case "warn":
                return console.warn;
            case "debug":
                return console.debug;
            default:
                return console.log;
        }
    }
}
