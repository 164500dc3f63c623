import type { Result } from "~shared/utils/Result";

import type { DMSCoordinates } from "@/utils/coordinates";

export type ContainerOpenError =
  | { type: "UNSUPPORTED_FORMAT"; message: string }
  | { type: "NO_METADATA_BLOCK"; message: string }
  | { type: "PARSE_FAILED"; message: string };

export type ContainerWriteError =
  | { type: "INVALID_VALUE"; message: string }
  | { type: "SERIALIZE_FAILED"; message: string };

/**
 * 已開啟的影像內嵌 metadata。
 * 只處理日期欄位與 GPS 經緯度；讀取、修改後再序列化回完整檔案內容。
 */
export interface MetadataContainer {
  /** 日期欄位的原始文字，不存在時為 undefined */
  getDateTime(): string | undefined;

  setDateTime(value: string): void;

  /** 經緯度與南北/東西參照都齊全且格式正確時才回傳 */
  getLocation(): DMSCoordinates | undefined;

  setLocation(location: DMSCoordinates): Result<void, ContainerWriteError>;

  serialize(): Result<Buffer, ContainerWriteError>;
}

export interface MetadataCodec {
  /**
   * 嘗試將檔案內容開啟為 metadata container。
   * 格式不支援、沒有 metadata 區塊或解析失敗時回傳錯誤。
   */
  open(bytes: Buffer): Result<MetadataContainer, ContainerOpenError>;
}
