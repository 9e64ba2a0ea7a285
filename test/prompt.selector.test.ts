/**
 * panebridge: 选项 → 按键序列测试
 */

import { describe, test, expect } from "vitest";
import { planMoves, planSelection, sendMoves, sendSelection } from "../src/prompt/selector.js";
import { FakeKeys } from "./fakes.js";

const NO_DELAY = { stepMs: 0, settleMs: 0 };

describe("planSelection", () => {
    test("select(5, 2)：3 次 Down + Enter", () => {
        expect(planSelection(5, 2)).toEqual(["Down", "Down", "Down", "Enter"]);
    });

    test("select(0, 3)：3 次 Up + Enter", () => {
        expect(planSelection(0, 3)).toEqual(["Up", "Up", "Up", "Enter"]);
    });

    test("select(2, 2)：只有 Enter", () => {
        expect(planSelection(2, 2)).toEqual(["Enter"]);
    });

    test("planMoves 不含 Enter", () => {
        expect(planMoves(1, 3)).toEqual(["Up", "Up"]);
        expect(planMoves(4, 4)).toEqual([]);
    });
});

describe("sendSelection", () => {
    test("按顺序发送", async () => {
        const keys = new FakeKeys();
        await sendSelection(keys, 5, 2, NO_DELAY);
        expect(keys.events).toEqual(["Down", "Down", "Down", "Enter"]);
    });

    test("sendMoves 只移动", async () => {
        const keys = new FakeKeys();
        await sendMoves(keys, 0, 2, NO_DELAY);
        expect(keys.events).toEqual(["Up", "Up"]);
    });

    test("按键失败时抛出", async () => {
        const keys = new FakeKeys();
        keys.failWith = new Error("tmux gone");
        await expect(sendSelection(keys, 1, 0, NO_DELAY)).rejects.toThrow("tmux gone");
    });
});
