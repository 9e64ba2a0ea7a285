/**
 * panebridge: 交互式菜单共享类型
 */

/**
 * 菜单选项
 */
export interface PromptOption {
    label: string;
    /** 选项下方缩进更深的说明文字（折行已按空格拼接） */
    description?: string;
}

/**
 * 从 pane 中解析出的交互式菜单
 */
export interface ParsedPrompt {
    question: string;
    /** 至少 2 项 */
    options: PromptOption[];
    /** 光标所在选项 */
    highlightedIndex: number;
}

/** Telegram chat id */
export type ChatRef = number;

/** Telegram message id */
export type MessageRef = number;

/**
 * tmux 可发送的按键名
 */
export type TerminalKey = "Up" | "Down" | "Enter" | "Escape";

/**
 * pane 快照来源
 *
 * capture 失败时返回空字符串，不抛错。
 */
export interface PaneSource {
    capture(): Promise<string>;
}

/**
 * 按键注入目标
 */
export interface KeySink {
    sendKey(key: TerminalKey): Promise<void>;
    /** 字面量文本（不附带 Enter） */
    sendText(text: string): Promise<void>;
}
