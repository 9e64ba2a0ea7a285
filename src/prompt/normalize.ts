/**
 * panebridge: 屏幕归一化
 *
 * 去掉 pane 快照里的终端控制序列，保留换行与行首缩进（缩进决定选项/描述的层级）
 */

/**
 * 终端转义序列
 *
 * - CSI：光标移动、SGR 颜色、私有模式（ESC [ ... final）
 * - OSC：窗口标题、超链接（ESC ] ... BEL 或 ESC \）
 * - 字符集切换：ESC ( B 等
 * - 其余双字节转义：ESC 7 / ESC 8 / ESC = / ESC > / ESC M ...
 */
const ESCAPE_SEQUENCE = /\x1b(?:\[[0-?]*[ -\/]*[@-~]|\][^\x07\x1b]*(?:\x07|\x1b\\)?|[()*+][0-9A-Za-z]|[=>78]|[@-Z\\-_])/g;

// 除 \t \n 外的 C0 控制字符与 DEL
const STRAY_CONTROL = /[\x00-\x08\x0b-\x1f\x7f]/g;

/**
 * 归一化 pane 快照
 *
 * 幂等：对已归一化的文本再执行一次结果不变。
 */
export function normalizeScreen(raw: string): string {
    let text = raw.replace(/\r\n/g, "\n");
    let previous: string;
    do {
        previous = text;
        text = text.replace(ESCAPE_SEQUENCE, "");
    } while (text !== previous);
    return text.replace(STRAY_CONTROL, "");
}
