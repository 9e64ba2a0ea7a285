#!/usr/bin/env node
/**
 * panebridge: CLI 入口
 *
 * - start：前台运行 bridge
 * - parse / capture：离线调试菜单解析
 * - turn-done：宿主 CLI 完成 hook 调用，结束当前回合
 */

import { Command } from "commander";
import { Api } from "grammy";
import { readFile } from "node:fs/promises";
import { getVersion } from "./version.js";
import { loadConfig, loadEnvFile } from "./config.js";
import { errorMessage } from "./errors.js";
import { logger, setLogLevel } from "./logger/index.js";
import { normalizeScreen } from "./prompt/normalize.js";
import { parsePrompt } from "./prompt/parser.js";
import { promptFingerprint } from "./prompt/fingerprint.js";
import { FilePendingTurn } from "./turn/pending.js";
import { completeTurn } from "./turn/complete.js";
import { parseHookInput } from "./turn/transcript.js";
import { TmuxSession } from "./tmux/session.js";

function enableDebugProfile(): void {
  process.env.LOG_LEVEL = "debug";
  setLogLevel("debug");
}

async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) {
    return "";
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

function printParse(raw: string): void {
  const prompt = parsePrompt(normalizeScreen(raw), loadConfig().parser);
  if (!prompt) {
    console.log("null");
    return;
  }
  console.log(JSON.stringify({ ...prompt, fingerprint: promptFingerprint(prompt) }, null, 2));
}

const program = new Command();

program.name("panebridge").description("panebridge - Telegram ↔ tmux interactive prompt bridge").version(getVersion());

program.hook("preAction", () => {
  loadEnvFile();
});

program
  .command("start")
  .description("前台启动 bridge（polling 或 webhook，由 BRIDGE_MODE 决定）")
  .option("-d, --debug", "LOG_LEVEL=debug")
  .action(async (options: { debug?: boolean }) => {
    if (options.debug) {
      enableDebugProfile();
    }
    const { startBridge } = await import("./index.js");
    await startBridge();
  });

program
  .command("parse <file>")
  .description("解析保存的 pane 快照并输出 JSON（未检测到菜单输出 null）")
  .action(async (file: string) => {
    printParse(await readFile(file, "utf-8"));
  });

program
  .command("capture")
  .description("抓取配置的 tmux pane 并输出解析结果")
  .option("-s, --session <name>", "tmux 会话名（默认 TMUX_SESSION）")
  .action(async (options: { session?: string }) => {
    const session = new TmuxSession(options.session ?? loadConfig().tmuxSession);
    if (!(await session.exists())) {
      const sessions = await TmuxSession.listSessions();
      console.error(`tmux 会话不存在: ${session.sessionName}（现有: ${sessions.join(", ") || "无"}）`);
      process.exitCode = 1;
      return;
    }
    printParse(await session.capture());
  });

program
  .command("turn-done")
  .description("结束当前回合并回传最后的回复（宿主 CLI 的 Stop hook 调用，stdin 为 hook JSON）")
  .option("--no-reply", "只结束回合，不回传回复")
  .action(async (options: { reply: boolean }) => {
    const config = loadConfig();
    const pending = new FilePendingTurn(config.pendingFile, config.turnMaxAgeSec * 1000);
    const { transcriptPath } = parseHookInput(await readStdin());
    const api = options.reply && config.botToken ? new Api(config.botToken) : undefined;
    const result = await completeTurn(transcriptPath, {
      pending,
      send: api
        ? (chatId, text, parseMode) => api.sendMessage(chatId, text, parseMode ? { parse_mode: parseMode } : undefined)
        : undefined,
    });
    logger.info(`回合已由 hook 结束: ${result}`, { module: "cli", transcriptPath });
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(`[panebridge] ${errorMessage(error)}`);
  process.exitCode = 1;
});
