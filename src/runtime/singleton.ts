/**
 * panebridge: 单实例守护（防止两个 bridge 同时 long-poll 同一个 bot，Telegram 会返回 409）
 *
 * 设计：
 * - 使用 pidfile 作为唯一锁（原子创建 wx）
 * - 若 pidfile 存在：检查 pid 是否存活
 *   - 存活：视为已运行
 *   - 不存活：视为陈旧锁，清理后重试
 */

import fs from "node:fs/promises";
import { rmSync } from "node:fs";
import path from "node:path";
import { CONFIG_DIR } from "../config.js";
import { logger } from "../logger/index.js";
import { errorMessage } from "../errors.js";

function getPidFilePath(name: string, runDir: string): string {
    return path.join(runDir, `${name}.pid`);
}

function isPidAlive(pid: number): boolean {
    if (!Number.isFinite(pid) || pid <= 1) return false;
    try {
        process.kill(pid, 0);
        return true;
    } catch {
        return false;
    }
}

function errnoCode(error: unknown): string | undefined {
    if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
        return error.code;
    }
    return undefined;
}

async function removeFile(file: string): Promise<void> {
    try {
        await fs.unlink(file);
    } catch (error) {
        if (errnoCode(error) !== "ENOENT") {
            logger.warn("pidfile 删除失败", { module: "singleton", file, error: errorMessage(error) });
        }
    }
}

export type AcquireLockResult =
    | { acquired: true; pidFile: string; release: () => Promise<void> }
    | { acquired: false; pidFile: string; pid?: number };

export async function acquireSingletonLock(
    name: string,
    runDir: string = path.join(CONFIG_DIR, "run")
): Promise<AcquireLockResult> {
    const pidFile = getPidFilePath(name, runDir);
    await fs.mkdir(path.dirname(pidFile), { recursive: true });

    for (let attempt = 0; attempt < 2; attempt++) {
        try {
            const fh = await fs.open(pidFile, "wx");
            try {
                await fh.writeFile(String(process.pid), "utf-8");
            } finally {
                await fh.close();
            }

            const release = () => removeFile(pidFile);
            // exit 回调里只能同步清理
            process.once("exit", () => rmSync(pidFile, { force: true }));
            return { acquired: true, pidFile, release };
        } catch (error) {
            if (errnoCode(error) !== "EEXIST") {
                throw error;
            }

            // 已存在：读取 pid 判断是否存活
            let pid: number | undefined;
            try {
                pid = Number((await fs.readFile(pidFile, "utf-8")).trim());
            } catch (readError) {
                logger.debug("pidfile 读取失败", { module: "singleton", pidFile, error: errorMessage(readError) });
            }
            if (pid !== undefined && isPidAlive(pid)) {
                return { acquired: false, pidFile, pid };
            }

            // 陈旧锁：清理后重试一次
            logger.warn("清理陈旧 pidfile", { module: "singleton", pidFile, pid });
            await removeFile(pidFile);
        }
    }

    return { acquired: false, pidFile };
}
