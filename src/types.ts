import type { DMSCoordinates } from "@/utils/coordinates";

/**
 * 拍攝時間。
 * zone 決定寫回 metadata 時的文字以哪個時區呈現：
 * EXIF 與檔名的時間是本地時間，sidecar 的 timestamp 是 UTC。
 */
export type CaptureDate = {
  value: Date;
  zone: "local" | "utc";
};

/** 單一來源取得的資訊，缺少的欄位即為找不到 */
export type Extraction = {
  date?: CaptureDate;
  location?: DMSCoordinates;
};
