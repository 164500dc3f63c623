import { format, isValid, parse } from "date-fns";

import { containerDateTimeFormat } from "@/constants";
import type { CaptureDate } from "@/types";

const EPOCH_MS_RE = /^\s*[+-]?\d+\s*$/;

/**
 * 解析 container 的日期欄位。
 * 規則：
 * 1) 整串為整數時視為毫秒 epoch。
 * 2) 否則以 `YYYY:MM:DD HH:mm:ss`（本地時間）解析。
 * 3) 兩者都失敗回傳 undefined。
 */
export function parseContainerDateTime(
  raw: string | undefined
): CaptureDate | undefined {
  if (raw === undefined) return undefined;

  if (EPOCH_MS_RE.test(raw)) {
    const d = new Date(Number(raw));
    return isValid(d) ? { value: d, zone: "local" } : undefined;
  }

  const d = parse(raw.trim(), containerDateTimeFormat, new Date());
  return isValid(d) ? { value: d, zone: "local" } : undefined;
}

/** 以日期本身的時區輸出 `YYYY:MM:DD HH:mm:ss` */
export function formatContainerDateTime(date: CaptureDate): string {
  if (date.zone === "utc") {
    // 2001-09-09T01:46:40.000Z → 2001:09:09 01:46:40
    return date.value
      .toISOString()
      .slice(0, 19)
      .replace("T", " ")
      .replace(/-/g, ":");
  }
  return format(date.value, containerDateTimeFormat);
}
