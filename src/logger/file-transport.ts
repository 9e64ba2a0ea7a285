/**
 * panebridge: 文件日志传输器
 *
 * 负责将日志写入文件，支持按大小自动轮转
 */

import fs from "node:fs";
import path from "node:path";
import os from "node:os";
import type { LogEntry, Transport, TransportOptions } from "./index.js";

export interface FileTransportOptions extends TransportOptions {
    /**
     * 日志文件路径（支持 ~ 开头）
     */
    filename: string;

    /**
     * 单个日志文件最大大小（字节），默认 10MB
     */
    maxSize?: number;

    /**
     * 保留的历史日志文件数量，默认 3
     */
    maxFiles?: number;
}

/**
 * 文件日志传输器（支持轮转）
 */
export class FileTransport implements Transport {
    private filename: string;
    private maxSize: number;
    private maxFiles: number;
    private stream: fs.WriteStream | null = null;
    private currentSize = 0;
    private disabled = false;

    constructor(options: FileTransportOptions) {
        this.filename = expandHome(options.filename);
        this.maxSize = options.maxSize ?? 10 * 1024 * 1024;
        this.maxFiles = options.maxFiles ?? 3;

        this.initialize();
    }

    private initialize(): void {
        try {
            fs.mkdirSync(path.dirname(this.filename), { recursive: true });
            this.openStream();
        } catch (error) {
            console.error(`[FileTransport] 初始化失败: ${error instanceof Error ? error.message : String(error)}`);
            console.error(`   日志文件: ${this.filename}`);
            console.error(`   将只输出到控制台`);
            this.disabled = true;
        }
    }

    private openStream(): void {
        if (fs.existsSync(this.filename)) {
            this.currentSize = fs.statSync(this.filename).size;

            // 当前文件已超过最大大小，先轮转
            if (this.currentSize >= this.maxSize) {
                this.rotateFiles();
                this.currentSize = 0;
            }
        } else {
            this.currentSize = 0;
        }

        this.stream = fs.createWriteStream(this.filename, { flags: "a" });
        this.stream.on("error", (error) => {
            console.error(`[FileTransport] 写入错误: ${error.message}`);
            this.disabled = true;
        });
    }

    write(entry: LogEntry): void {
        if (this.disabled || !this.stream) {
            return;
        }

        try {
            const line = formatFileLine(entry);
            const size = Buffer.byteLength(line, "utf8");

            if (this.currentSize + size > this.maxSize) {
                this.rotate();
            }

            this.stream?.write(line);
            this.currentSize += size;
        } catch (error) {
            console.error(`[FileTransport] 写入失败: ${error instanceof Error ? error.message : String(error)}`);
            this.disabled = true;
        }
    }

    private rotate(): void {
        if (!this.stream) {
            return;
        }

        try {
            this.stream.end();
            this.stream = null;
            this.rotateFiles();
            this.currentSize = 0;
            this.openStream();
        } catch (error) {
            console.error(`[FileTransport] 轮转失败: ${error instanceof Error ? error.message : String(error)}`);
            this.disabled = true;
        }
    }

    /**
     * 从后往前重命名：.N 删除，.i → .i+1，当前 → .1
     */
    private rotateFiles(): void {
        const oldest = `${this.filename}.${this.maxFiles}`;
        if (fs.existsSync(oldest)) {
            fs.unlinkSync(oldest);
        }

        for (let i = this.maxFiles - 1; i >= 1; i--) {
            const from = `${this.filename}.${i}`;
            if (fs.existsSync(from)) {
                fs.renameSync(from, `${this.filename}.${i + 1}`);
            }
        }

        if (fs.existsSync(this.filename)) {
            fs.renameSync(this.filename, `${this.filename}.1`);
        }
    }

    close(): void {
        if (this.stream) {
            this.stream.end();
            this.stream = null;
        }
    }
}

/**
 * 文件日志行格式
 *
 * 默认不把聊天原文或 pane 内容写入文件，只落长度。
 */
export function formatFileLine(entry: LogEntry): string {
    const { timestamp, level, message, module, meta } = entry;
    const levelStr = level.toUpperCase().padEnd(5);
    const moduleStr = module ? `[${module}] ` : "";

    const parts: string[] = [];
    if (meta) {
        if (meta.chatId !== undefined) parts.push(`chatId=${String(meta.chatId)}`);
        if (meta.messageId !== undefined) parts.push(`messageId=${String(meta.messageId)}`);
        if (typeof meta.fingerprint === "string") parts.push(`fp=${meta.fingerprint.slice(0, 12)}`);
        if (meta.textLength !== undefined) parts.push(`textLen=${String(meta.textLength)}`);
        if (typeof meta.error === "string") parts.push(`error="${meta.error.slice(0, 200)}"`);
    }
    const metaStr = parts.length > 0 ? ` [${parts.join(" ")}]` : "";

    return `${timestamp} [${levelStr}] ${moduleStr}${message}${metaStr}\n`;
}

function expandHome(filePath: string): string {
    if (filePath.startsWith("~/")) {
        return path.join(os.homedir(), filePath.slice(2));
    }
    return filePath;
}
