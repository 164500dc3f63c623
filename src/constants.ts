/** 預設的策略順序，排在前面的優先權較高 */
export const defaultStrategies = ["exif", "json", "filename"] as const;

/** filename 策略預設使用的檔名格式（strftime 語法） */
export const defaultNameFormats = ["IMG_%Y%m%d_%H%M%S"] as const;

/** sidecar 檔名為 `<原檔名>.json` */
export const sidecarExtension = ".json";

/** 不處理、也不輸出的副檔名 */
export const skippedExtensions = [sidecarExtension, ".gif"] as const;

/** 寫回 metadata 時使用的日期文字格式（date-fns 語法） */
export const containerDateTimeFormat = "yyyy:MM:dd HH:mm:ss";
