import type { Result } from "~shared/utils/Result";

export type ScanError = {
  type: "SCAN_FAILED";
  message: string;
};

export type ScannedEntry = {
  fullPath: string;
  name: string;
  /** 一般檔案，或指向一般檔案的 symlink */
  isFile: boolean;
};

export interface FileSystemScanner {
  /** 列出目錄第一層的所有項目（含隱藏檔與子目錄），依名稱排序 */
  scan(rootPath: string): Promise<Result<ScannedEntry[], ScanError>>;
}
