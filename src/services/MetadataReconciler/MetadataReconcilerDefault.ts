import type { Logger } from "~shared/Logger";
import { type Result, ok } from "~shared/utils/Result";

import type { ExtractError, Extractor } from "../Extractor";
import type { SourceFile } from "../SourceFile";
import type {
  MetadataReconciler,
  ReconciledMetadata,
} from "./MetadataReconciler";

/**
 * 反向走訪策略清單，每個策略找到的欄位直接覆蓋目前結果。
 * 越晚執行（清單越前面）的策略最後覆蓋，因此優先權最高。
 *
 * 例如 `exif,json,filename`：
 *   filename → json → exif，exif 有日期就以 exif 為準，
 *   exif 沒有日期時保留 json（或 filename）的日期。
 */
export class MetadataReconcilerDefault implements MetadataReconciler {
  private readonly extractors: ReadonlyMap<string, Extractor>;
  private readonly logger: Logger;

  constructor(deps: { extractors: readonly Extractor[]; logger: Logger }) {
    this.extractors = new Map(deps.extractors.map((e) => [e.name, e]));
    this.logger = deps.logger.extend("reconcile");
  }

  async reconcile(
    file: SourceFile,
    strategies: readonly string[]
  ): Promise<Result<ReconciledMetadata, ExtractError>> {
    const merged: ReconciledMetadata = {};

    for (const strategy of [...strategies].reverse()) {
      const name = strategy.trim().toLowerCase();
      const extractor = this.extractors.get(name);
      if (!extractor) {
        this.logger.debug({ file: file.name })`略過未知的策略 ${strategy}`;
        continue;
      }

      const extracted = await extractor.extract(file);
      if (!extracted.ok) return extracted;

      const { date, location } = extracted.value;
      if (date) {
        merged.date = date;
        merged.dateSource = name;
      }
      if (location) {
        merged.location = location;
        merged.locationSource = name;
      }
    }

    merged.container = file.openedContainer();
    return ok(merged);
  }
}
