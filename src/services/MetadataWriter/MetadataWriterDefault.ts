import { utimes, writeFile } from "node:fs/promises";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import { formatContainerDateTime } from "../MetadataContainer";
import type { ReconciledMetadata } from "../MetadataReconciler";
import type { SourceFile } from "../SourceFile";
import type { MetadataWriter, WriteError, WriteSummary } from "./MetadataWriter";

/**
 * 將合併後的日期與位置寫入輸出檔。
 * - 有 container：寫入日期欄位與 GPS 後序列化
 * - 沒有 container（或序列化失敗）：原檔內容直接複製
 * - 有日期時，輸出檔的存取與修改時間設為該日期
 */
export class MetadataWriterDefault implements MetadataWriter {
  private readonly logger: Logger;

  constructor(deps: { logger: Logger }) {
    this.logger = deps.logger.extend("write");
  }

  async write(input: {
    metadata: ReconciledMetadata;
    source: SourceFile;
    outputPath: string;
  }): Promise<Result<WriteSummary, WriteError>> {
    const { metadata, source, outputPath } = input;
    const { date, location, container } = metadata;
    const logger = this.logger.append({ file: source.name });

    let dateWritten = false;
    let locationWritten = false;
    let bytes: Buffer | undefined;

    if (container) {
      if (date) {
        container.setDateTime(formatContainerDateTime(date));
        dateWritten = true;
      }
      if (location) {
        const res = container.setLocation(location);
        if (res.ok) {
          locationWritten = true;
        } else {
          logger.debug({ reason: res.error.type })`略過寫入位置：${res.error.message}`;
        }
      }

      const serialized = container.serialize();
      if (serialized.ok) {
        bytes = serialized.value;
      } else {
        logger.warn({
          reason: serialized.error.type,
        })`metadata 序列化失敗，改為直接複製原檔：${serialized.error.message}`;
        dateWritten = false;
        locationWritten = false;
      }
    }

    const passthrough = bytes === undefined;
    try {
      await writeFile(outputPath, bytes ?? (await source.bytes()));
      if (date) await utimes(outputPath, date.value, date.value);
    } catch (e) {
      return err({
        type: "WRITE_FAILED",
        message: e instanceof Error ? e.message : String(e),
        outputPath,
      });
    }

    return ok({
      outputPath,
      passthrough,
      dateWritten,
      locationWritten,
      timestampSet: date !== undefined,
    });
  }
}
