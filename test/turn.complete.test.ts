/**
 * panebridge: 回合结束（turn-done）测试
 */

import { describe, expect, test } from "vitest";
import { MemoryPendingTurn } from "../src/turn/pending.js";
import { clampResponse, completeTurn } from "../src/turn/complete.js";
import { TRANSCRIPT } from "./fakes.js";

describe("completeTurn", () => {
    test("回传最后的回复并结束回合", async () => {
        const pending = new MemoryPendingTurn();
        pending.begin(5);
        const sent: Array<[number, string, string | undefined]> = [];

        const result = await completeTurn("/tmp/t.jsonl", {
            pending,
            send: async (chatId, text, parseMode) => {
                sent.push([chatId, text, parseMode]);
            },
            readTranscript: async () => TRANSCRIPT,
        });

        expect(result).toBe("replied");
        expect(sent).toEqual([[5, "Looking at it.\n\nDone: renamed.", "HTML"]]);
        expect(pending.isPending()).toBe(false);
    });

    test("HTML 被拒时改发纯文本", async () => {
        const pending = new MemoryPendingTurn();
        pending.begin(5);
        const sent: Array<[string, string | undefined]> = [];
        const transcript = [
            JSON.stringify({ type: "user", message: { content: "check it" } }),
            JSON.stringify({ type: "assistant", message: { content: [{ type: "text", text: "Use **a < b**" }] } }),
        ].join("\n");

        const result = await completeTurn("/tmp/t.jsonl", {
            pending,
            send: async (_chatId, text, parseMode) => {
                sent.push([text, parseMode]);
                if (parseMode === "HTML") throw new Error("Bad Request: can't parse entities");
            },
            readTranscript: async () => transcript,
        });

        expect(result).toBe("replied");
        expect(sent).toEqual([
            ["Use <b>a &lt; b</b>", "HTML"],
            ["Use **a < b**", undefined],
        ]);
        expect(pending.isPending()).toBe(false);
    });

    test("没有回合时不回传", async () => {
        const sent: string[] = [];
        const result = await completeTurn("/tmp/t.jsonl", {
            pending: new MemoryPendingTurn(),
            send: async (_chatId, text) => {
                sent.push(text);
            },
            readTranscript: async () => TRANSCRIPT,
        });

        expect(result).toBe("no-turn");
        expect(sent).toEqual([]);
    });

    test("读取 transcript 失败仍结束回合", async () => {
        const pending = new MemoryPendingTurn();
        pending.begin(5);

        const result = await completeTurn("/missing.jsonl", {
            pending,
            send: async () => undefined,
            readTranscript: async () => {
                throw new Error("ENOENT");
            },
        });

        expect(result).toBe("ended");
        expect(pending.isPending()).toBe(false);
    });

    test("clampResponse", () => {
        expect(clampResponse("abcdef", 4)).toBe("abcd\n...");
        expect(clampResponse("abcd", 4)).toBe("abcd");
    });
});
