import { stat } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

export function expandHome(p: string) {
  if (p.startsWith("~/")) return path.join(os.homedir(), p.slice(2));
  return p;
}

export async function exists(p: string) {
  try {
    await stat(p);
    return true;
  } catch {
    return false;
  }
}

/** 路徑不存在時回傳 undefined；symlink 會跟隨到實際目標 */
export async function pathKind(
  p: string
): Promise<"file" | "directory" | "other" | undefined> {
  try {
    const s = await stat(p);
    if (s.isFile()) return "file";
    if (s.isDirectory()) return "directory";
    return "other";
  } catch {
    return undefined;
  }
}

/** 逗號分隔清單，去除空白與空項目；重複給同一選項時會合併 */
export function splitList(value: string | readonly string[]) {
  const parts = typeof value === "string" ? [value] : value;
  return parts
    .flatMap((v) => v.split(","))
    .map((s) => s.trim())
    .filter(Boolean);
}

export function toInt(v: number | string | undefined, dflt: number) {
  if (v === undefined) return dflt;
  const n = typeof v === "string" ? parseInt(v, 10) : v;
  return Number.isFinite(n) ? n : dflt;
}
