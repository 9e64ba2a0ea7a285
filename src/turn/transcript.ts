/**
 * panebridge: 会话 transcript 读取
 *
 * 宿主 CLI 的 transcript 为 JSONL，每行一条 {type, message: {content}}。
 * 回合结束时取最后一条用户输入之后的全部 assistant 文本，回传到 chat。
 */

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseLine(line: string): Json | undefined {
    if (!line.trim()) return undefined;
    try {
        const parsed: unknown = JSON.parse(line);
        return isRecord(parsed) ? parsed : undefined;
    } catch {
        // 写到一半的行
        return undefined;
    }
}

function contentBlocks(entry: Json): unknown[] {
    const message = entry.message;
    if (!isRecord(message)) return [];
    const content = message.content;
    if (typeof content === "string") return [{ type: "text", text: content }];
    return Array.isArray(content) ? content : [];
}

/**
 * 真正的用户输入（tool_result 也以 user 身份写入，需要排除）
 */
function isUserInput(entry: Json): boolean {
    if (entry.type !== "user") return false;
    return !contentBlocks(entry).some(block => isRecord(block) && block.type === "tool_result");
}

/**
 * 最后一次用户输入之后的 assistant 文本（段落间空一行）；没有时返回空字符串
 */
export function extractLastResponse(transcript: string): string {
    const entries = transcript.split("\n").map(parseLine).filter((e): e is Json => e !== undefined);

    let start = -1;
    entries.forEach((entry, index) => {
        if (isUserInput(entry)) start = index;
    });
    if (start < 0) return "";

    const texts: string[] = [];
    for (const entry of entries.slice(start + 1)) {
        if (entry.type !== "assistant") continue;
        for (const block of contentBlocks(entry)) {
            if (isRecord(block) && block.type === "text" && typeof block.text === "string" && block.text.trim()) {
                texts.push(block.text.trim());
            }
        }
    }
    return texts.join("\n\n");
}

/**
 * hook stdin：{"transcript_path": "..."}
 */
export function parseHookInput(raw: string): { transcriptPath?: string } {
    const parsed = parseLine(raw);
    const transcriptPath = parsed?.transcript_path;
    return typeof transcriptPath === "string" && transcriptPath ? { transcriptPath } : {};
}
