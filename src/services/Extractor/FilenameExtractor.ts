import { type Result, ok } from "~shared/utils/Result";

import type { Extraction } from "@/types";

import type { SourceFile } from "../SourceFile";
import type { ExtractError, Extractor } from "./Extractor";
import { type FilenamePattern, parseFilenameDate } from "./FilenamePattern";

/** 依序嘗試每個檔名格式，第一個成功的為準；檔名不含位置資訊 */
export class FilenameExtractor implements Extractor {
  readonly name = "filename";

  constructor(private readonly patterns: readonly FilenamePattern[]) {}

  async extract(file: SourceFile): Promise<Result<Extraction, ExtractError>> {
    for (const pattern of this.patterns) {
      const date = parseFilenameDate(file.stem, pattern);
      if (date) return ok({ date: { value: date, zone: "local" } });
    }
    return ok({});
  }
}
