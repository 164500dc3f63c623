import type { Result } from "~shared/utils/Result";

import type { DecimalCoordinates } from "@/utils/coordinates";

import type { ExtractError } from "../Extractor";
import type { SkipReason } from "../MetadataReconciler";
import type { WriteError } from "../MetadataWriter";

export type BatchOptions = {
  inputDir: string;
  outputDir: string;
  /** 策略清單，越前面優先權越高 */
  strategies: readonly string[];
  /** 同時處理的檔案數，預設 1 */
  concurrency?: number;
};

export type PreflightError =
  | { type: "INPUT_NOT_FOUND"; message: string }
  | { type: "INPUT_NOT_DIRECTORY"; message: string }
  | { type: "OUTPUT_NOT_DIRECTORY"; message: string }
  | { type: "OUTPUT_CREATE_FAILED"; message: string }
  | { type: "SCAN_FAILED"; message: string };

export type FileError =
  | ExtractError
  | WriteError
  | { type: "UNEXPECTED"; message: string };

export type FileOutcome =
  | {
      status: "processed";
      name: string;
      /** ISO 8601 */
      date?: string;
      dateSource?: string;
      location?: DecimalCoordinates;
      locationSource?: string;
      passthrough: boolean;
    }
  | { status: "skipped"; name: string; reason: SkipReason }
  | { status: "failed"; name: string; error: FileError };

export type BatchSummary = {
  inputDir: string;
  outputDir: string;
  processed: number;
  skipped: number;
  failed: number;
  files: FileOutcome[];
};

export interface BatchService {
  /**
   * 處理輸入目錄第一層的所有檔案，輸出到 outputDir 下同名檔案。
   * 目錄參數不合法時不處理任何檔案並回傳錯誤；單一檔案失敗不影響其他檔案。
   */
  run(options: BatchOptions): Promise<Result<BatchSummary, PreflightError>>;
}
