import { readFile } from "node:fs/promises";
import path from "node:path";

import type { Result } from "~shared/utils/Result";

import type {
  ContainerOpenError,
  MetadataCodec,
  MetadataContainer,
} from "./MetadataContainer";

/**
 * 處理中的單一輸入檔。
 * 檔案內容與 metadata container 各只讀取／開啟一次，
 * 由萃取階段開啟的 container 會原封不動交給寫入階段。
 */
export class SourceFile {
  readonly name: string;
  /** 去掉最後一個副檔名的檔名 */
  readonly stem: string;

  private bytesPromise?: Promise<Buffer>;
  private containerResult?: Result<MetadataContainer, ContainerOpenError>;

  constructor(
    readonly filePath: string,
    private readonly codec: MetadataCodec
  ) {
    this.name = path.basename(filePath);
    this.stem = path.parse(this.name).name;
  }

  bytes(): Promise<Buffer> {
    this.bytesPromise ??= readFile(this.filePath);
    return this.bytesPromise;
  }

  async container(): Promise<Result<MetadataContainer, ContainerOpenError>> {
    if (!this.containerResult) {
      const bytes = await this.bytes();
      this.containerResult ??= this.codec.open(bytes);
    }
    return this.containerResult;
  }

  /** 已成功開啟的 container；尚未開啟或開啟失敗時為 undefined */
  openedContainer(): MetadataContainer | undefined {
    const result = this.containerResult;
    return result && result.ok ? result.value : undefined;
  }
}
