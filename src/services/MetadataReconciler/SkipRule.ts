import path from "node:path";

import { skippedExtensions } from "@/constants";

export type SkipReason = "NOT_A_FILE" | "HIDDEN" | "EXCLUDED_EXTENSION";

const excluded: ReadonlySet<string> = new Set(skippedExtensions);

/**
 * 判斷目錄項目是否略過（不萃取、不輸出）。
 * 不是一般檔案、以 "." 開頭、或為 sidecar / GIF 時略過。
 */
export function skipReason(entry: {
  name: string;
  isFile: boolean;
}): SkipReason | undefined {
  if (!entry.isFile) return "NOT_A_FILE";
  if (entry.name.startsWith(".")) return "HIDDEN";
  if (excluded.has(path.extname(entry.name).toLowerCase())) {
    return "EXCLUDED_EXTENSION";
  }
  return undefined;
}
