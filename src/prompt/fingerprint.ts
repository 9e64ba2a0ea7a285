/**
 * panebridge: 菜单指纹
 *
 * 只取问题和选项标签；描述会随终端宽度折行，不参与身份判断。
 */

import { createHash } from "node:crypto";
import type { ParsedPrompt } from "./types.js";

// 归一化后的文本中不会出现 \x1f
const SEPARATOR = "\x1f";

export function promptFingerprint(prompt: Pick<ParsedPrompt, "question" | "options">): string {
    const parts = [prompt.question, ...prompt.options.map(option => option.label)];
    return createHash("sha256").update(parts.join(SEPARATOR)).digest("hex");
}
