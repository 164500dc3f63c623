import type { Result } from "~shared/utils/Result";

import type { CaptureDate } from "@/types";
import type { DMSCoordinates } from "@/utils/coordinates";

import type { ExtractError } from "../Extractor";
import type { MetadataContainer } from "../MetadataContainer";
import type { SourceFile } from "../SourceFile";

export type ReconciledMetadata = {
  date?: CaptureDate;
  location?: DMSCoordinates;
  /** 提供日期的策略名稱 */
  dateSource?: string;
  /** 提供位置的策略名稱 */
  locationSource?: string;
  /** exif 策略開啟的 container，交由寫入階段沿用 */
  container?: MetadataContainer;
};

export interface MetadataReconciler {
  /**
   * 依策略清單合併各來源的日期與位置。
   * 清單越前面的策略優先權越高；某策略找不到的欄位不會蓋掉其他策略的結果。
   */
  reconcile(
    file: SourceFile,
    strategies: readonly string[]
  ): Promise<Result<ReconciledMetadata, ExtractError>>;
}
