import type { Result } from "~shared/utils/Result";

import type { ReconciledMetadata } from "../MetadataReconciler";
import type { SourceFile } from "../SourceFile";

export type WriteSummary = {
  outputPath: string;
  /** 輸出內容與原檔完全相同 */
  passthrough: boolean;
  dateWritten: boolean;
  locationWritten: boolean;
  /** 是否已將檔案時間設為拍攝時間 */
  timestampSet: boolean;
};

export type WriteError = {
  type: "WRITE_FAILED";
  message: string;
  outputPath: string;
};

export interface MetadataWriter {
  write(input: {
    metadata: ReconciledMetadata;
    source: SourceFile;
    outputPath: string;
  }): Promise<Result<WriteSummary, WriteError>>;
}
