/**
 * panebridge: 版本信息（动态读取 package.json）
 */

import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

let cachedVersion: string | undefined;

/**
 * 获取版本号（源码运行与 dist/src 运行时 package.json 的相对位置不同）
 */
export function getVersion(): string {
    if (cachedVersion) {
        return cachedVersion;
    }

    for (const candidate of [path.join(__dirname, "..", "package.json"), path.join(__dirname, "..", "..", "package.json")]) {
        try {
            const pkg: unknown = JSON.parse(fs.readFileSync(candidate, "utf-8"));
            if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
                cachedVersion = pkg.version;
                return cachedVersion;
            }
        } catch {
            continue;
        }
    }
    return "0.0.0";
}
