/**
 * panebridge: 单实例锁测试
 */

import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { existsSync, mkdirSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { randomUUID } from "node:crypto";
import { acquireSingletonLock } from "../src/runtime/singleton.js";

describe("acquireSingletonLock", () => {
    let runDir: string;

    beforeEach(() => {
        runDir = join(tmpdir(), `panebridge-run-${randomUUID()}`);
    });

    afterEach(() => {
        rmSync(runDir, { recursive: true, force: true });
    });

    test("首次获取写入当前 pid，释放后可再次获取", async () => {
        const first = await acquireSingletonLock("bridge", runDir);
        expect(first.acquired).toBe(true);
        expect(readFileSync(join(runDir, "bridge.pid"), "utf-8")).toBe(String(process.pid));

        if (first.acquired) {
            await first.release();
        }
        expect(existsSync(join(runDir, "bridge.pid"))).toBe(false);

        const again = await acquireSingletonLock("bridge", runDir);
        expect(again.acquired).toBe(true);
    });

    test("持有者存活时获取失败", async () => {
        await acquireSingletonLock("bridge", runDir);
        const second = await acquireSingletonLock("bridge", runDir);

        expect(second).toEqual({ acquired: false, pidFile: join(runDir, "bridge.pid"), pid: process.pid });
    });

    test("陈旧 pidfile 被清理", async () => {
        mkdirSync(runDir, { recursive: true });
        writeFileSync(join(runDir, "bridge.pid"), "999999999");

        const result = await acquireSingletonLock("bridge", runDir);
        expect(result.acquired).toBe(true);
        expect(readFileSync(join(runDir, "bridge.pid"), "utf-8")).toBe(String(process.pid));
    });
});
