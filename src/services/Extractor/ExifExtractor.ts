import type { Logger } from "~shared/Logger";
import { type Result, ok } from "~shared/utils/Result";

import type { Extraction } from "@/types";

import { parseContainerDateTime } from "../MetadataContainer";
import type { SourceFile } from "../SourceFile";
import type { ExtractError, Extractor } from "./Extractor";

/**
 * 從影像內嵌的 metadata 取得日期與位置。
 * 無法開啟（含沒有 metadata 區塊）時視為兩者皆無。
 */
export class ExifExtractor implements Extractor {
  readonly name = "exif";
  private readonly logger: Logger;

  constructor(deps: { logger: Logger }) {
    this.logger = deps.logger.extend("exif");
  }

  async extract(file: SourceFile): Promise<Result<Extraction, ExtractError>> {
    const opened = await file.container();
    if (!opened.ok) {
      this.logger.debug({
        file: file.name,
        reason: opened.error.type,
      })`無法開啟 metadata：${opened.error.message}`;
      return ok({});
    }

    const container = opened.value;
    return ok({
      date: parseContainerDateTime(container.getDateTime()),
      location: container.getLocation(),
    });
  }
}
