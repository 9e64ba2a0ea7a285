/**
 * panebridge: 日志系统
 *
 * 轻量级日志实现，支持多传输器、日志级别、文件轮转
 */

import { ConsoleTransport } from "./console-transport.js";
import { FileTransport } from "./file-transport.js";

/**
 * 日志级别
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * 日志级别优先级（数字越大优先级越高）
 */
const LevelPriority: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
};

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === "string" && LOG_LEVELS.some(level => level === value);
}

/**
 * 结构化元数据（module 会被提升为日志条目的模块名）
 */
export type LogMeta = Record<string, unknown>;

/**
 * 日志条目
 */
export interface LogEntry {
    timestamp: string;
    level: LogLevel;
    message: string;
    module?: string;
    meta?: LogMeta;
}

/**
 * 传输器接口
 */
export interface Transport {
    write(entry: LogEntry): void;
    close?(): void;
}

/**
 * 传输器选项（基类）
 */
export interface TransportOptions {
    /**
     * 最低日志级别（低于该级别的条目由传输器自行丢弃）
     */
    level?: LogLevel;
}

/**
 * Logger 配置选项
 */
export interface LoggerOptions {
    level?: LogLevel;
    transports?: Transport[];
}

/**
 * Logger 类
 */
export class Logger {
    private level: LogLevel;
    private transports: Transport[];

    constructor(options: LoggerOptions = {}) {
        this.level = options.level ?? "info";
        this.transports = options.transports ?? [];
    }

    private shouldLog(level: LogLevel): boolean {
        return LevelPriority[level] >= LevelPriority[this.level];
    }

    private log(level: LogLevel, message: string, meta?: LogMeta): void {
        if (!this.shouldLog(level)) {
            return;
        }

        // 时间戳：YYYY-MM-DD HH:MM:SS.mmm
        const timestamp = new Date().toISOString().replace("T", " ").replace("Z", "").slice(0, 23);
        const module = typeof meta?.module === "string" ? meta.module : undefined;

        const entry: LogEntry = { timestamp, level, message, module, meta };

        for (const transport of this.transports) {
            try {
                transport.write(entry);
            } catch (error) {
                // 传输器写入失败，输出到 console 并继续
                console.error(`[Logger Error] ${error instanceof Error ? error.message : String(error)}`);
            }
        }
    }

    debug(message: string, meta?: LogMeta): void {
        this.log("debug", message, meta);
    }

    info(message: string, meta?: LogMeta): void {
        this.log("info", message, meta);
    }

    warn(message: string, meta?: LogMeta): void {
        this.log("warn", message, meta);
    }

    error(message: string, meta?: LogMeta): void {
        this.log("error", message, meta);
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    /**
     * 关闭所有传输器
     */
    close(): void {
        for (const transport of this.transports) {
            transport.close?.();
        }
    }
}

/**
 * 创建 Logger 单例
 *
 * 只从 ENV 读取：LOG_LEVEL / LOG_CONSOLE / LOG_FILE / LOG_PATH
 */
function createLogger(): Logger {
    const envLevel = process.env.LOG_LEVEL;
    const level: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

    const transports: Transport[] = [];

    if (process.env.LOG_CONSOLE !== "false") {
        transports.push(new ConsoleTransport({ colorize: process.stdout.isTTY === true }));
    }

    if (process.env.LOG_FILE !== "false") {
        try {
            transports.push(new FileTransport({
                filename: process.env.LOG_PATH ?? "~/.config/panebridge/log/panebridge.log",
                maxSize: 10 * 1024 * 1024, // 10MB
                maxFiles: 3,
            }));
        } catch (error) {
            console.warn(`文件日志初始化失败: ${error instanceof Error ? error.message : String(error)}`);
        }
    }

    return new Logger({ level, transports });
}

export const logger = createLogger();

export function setLogLevel(level: LogLevel): void {
    logger.setLevel(level);
}

process.on("exit", () => {
    logger.close();
});
