/**
 * panebridge: 菜单状态与互斥锁测试
 */

import { describe, test, expect } from "vitest";
import { Mutex } from "../src/runtime/mutex.js";
import { PromptState } from "../src/prompt/state.js";
import { deferred } from "./fakes.js";

describe("Mutex", () => {
    test("临界区按进入顺序串行执行", async () => {
        const mutex = new Mutex();
        const gate = deferred();
        const events: string[] = [];

        const first = mutex.runExclusive(async () => {
            events.push("first:start");
            await gate.promise;
            events.push("first:end");
        });
        const second = mutex.runExclusive(() => {
            events.push("second");
        });

        await new Promise(resolve => setTimeout(resolve, 0));
        expect(events).toEqual(["first:start"]);
        gate.resolve();
        await Promise.all([first, second]);

        expect(events).toEqual(["first:start", "first:end", "second"]);
    });

    test("临界区抛错后锁仍释放", async () => {
        const mutex = new Mutex();
        await expect(mutex.runExclusive(() => {
            throw new Error("boom");
        })).rejects.toThrow("boom");
        await expect(mutex.runExclusive(() => 42)).resolves.toBe(42);
    });
});

describe("PromptState", () => {
    test("claim 解绑消息、清空选项、保留指纹和 chat", async () => {
        const state = new PromptState({
            fingerprint: "fp",
            boundChat: 1,
            boundMessage: 100,
            options: [{ label: "1. Yes" }, { label: "2. No" }],
            highlightedIndex: 1,
        });

        const claimed = await state.withLock(s => s.claim());

        expect(claimed).toEqual({
            chatId: 1,
            messageId: 100,
            options: [{ label: "1. Yes" }, { label: "2. No" }],
            highlightedIndex: 1,
        });
        expect(state.snapshot()).toEqual({
            fingerprint: "fp",
            boundChat: 1,
            boundMessage: undefined,
            options: [],
            highlightedIndex: 1,
        });
        expect(state.hasBoundControl()).toBe(false);
        expect(state.hasClaimInFlight()).toBe(true);

        await state.withLock(s => s.releaseClaim());
        expect(state.hasClaimInFlight()).toBe(false);
    });

    test("clear 不影响进行中的认领", () => {
        const state = new PromptState({ fingerprint: "fp", boundChat: 1, boundMessage: 100 });
        state.claim();
        state.clear();
        expect(state.hasClaimInFlight()).toBe(true);
        state.releaseClaim();
        state.releaseClaim();
        expect(state.hasClaimInFlight()).toBe(false);
    });

    test("clear 清空全部字段", () => {
        const state = new PromptState({ fingerprint: "fp", boundChat: 1, boundMessage: 100, highlightedIndex: 2 });
        state.clear();
        expect(state.snapshot()).toEqual({
            fingerprint: undefined,
            boundChat: undefined,
            boundMessage: undefined,
            options: [],
            highlightedIndex: 0,
        });
    });

    test("snapshot 是拷贝", () => {
        const state = new PromptState({ options: [{ label: "a" }] });
        const snap = state.snapshot();
        snap.options.push({ label: "b" });
        expect(state.options).toEqual([{ label: "a" }]);
    });
});
