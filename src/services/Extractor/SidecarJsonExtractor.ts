import { Type as t } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { readFile } from "node:fs/promises";

import { type Result, err, ok } from "~shared/utils/Result";

import { sidecarExtension } from "@/constants";
import type { Extraction } from "@/types";
import { toDMS } from "@/utils/coordinates";
import { exists } from "@/utils/helper";

import type { SourceFile } from "../SourceFile";
import type { ExtractError, Extractor } from "./Extractor";

/** 相片匯出服務產生的 sidecar；只取用需要的欄位，其餘欄位忽略 */
export const sidecarSchema = t.Object({
  photoTakenTime: t.Object({
    timestamp: t.Union([
      t.String({ pattern: "^\\s*[+-]?\\d+\\s*$" }),
      t.Integer(),
    ]),
  }),
  geoData: t.Object({
    latitude: t.Number(),
    longitude: t.Number(),
  }),
});

export function sidecarPathOf(filePath: string) {
  return `${filePath}${sidecarExtension}`;
}

/**
 * 從 `<原檔名>.json` 取得日期與位置。
 * - sidecar 不存在：兩者皆無
 * - sidecar 存在但無法讀取、不是 JSON 或結構不符：回傳錯誤，該檔處理失敗
 * - 經緯度 (0, 0) 代表未設定位置
 */
export class SidecarJsonExtractor implements Extractor {
  readonly name = "json";

  async extract(file: SourceFile): Promise<Result<Extraction, ExtractError>> {
    const filePath = sidecarPathOf(file.filePath);
    if (!(await exists(filePath))) return ok({});

    let text: string;
    try {
      text = await readFile(filePath, "utf8");
    } catch (e) {
      return err({
        type: "SIDECAR_READ_FAILED",
        message: e instanceof Error ? e.message : String(e),
        filePath,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (e) {
      return err({
        type: "SIDECAR_PARSE_FAILED",
        message: e instanceof Error ? e.message : String(e),
        filePath,
      });
    }

    if (!Value.Check(sidecarSchema, raw)) {
      const first = Value.Errors(sidecarSchema, raw).First();
      return err({
        type: "SIDECAR_INVALID",
        message: first
          ? `${first.path || "/"}: ${first.message}`
          : "sidecar 結構不符",
        filePath,
      });
    }

    const taken = new Date(Number(raw.photoTakenTime.timestamp) * 1000);
    if (Number.isNaN(taken.getTime())) {
      return err({
        type: "SIDECAR_INVALID",
        message: "/photoTakenTime/timestamp: 超出可表示的時間範圍",
        filePath,
      });
    }

    const { latitude, longitude } = raw.geoData;
    return ok({
      date: { value: taken, zone: "utc" },
      location:
        latitude === 0 && longitude === 0
          ? undefined
          : toDMS({ latitude, longitude }),
    });
  }
}
