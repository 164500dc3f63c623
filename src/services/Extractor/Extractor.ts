import type { Result } from "~shared/utils/Result";

import type { Extraction } from "@/types";

import type { SourceFile } from "../SourceFile";

/** 只有 sidecar 存在但內容不符時才會產生錯誤，其餘情況皆視為找不到 */
export type ExtractError =
  | { type: "SIDECAR_READ_FAILED"; message: string; filePath: string }
  | { type: "SIDECAR_PARSE_FAILED"; message: string; filePath: string }
  | { type: "SIDECAR_INVALID"; message: string; filePath: string };

export interface Extractor {
  /** 策略名稱，對應 `-s` 參數中的項目 */
  readonly name: string;

  extract(file: SourceFile): Promise<Result<Extraction, ExtractError>>;
}
