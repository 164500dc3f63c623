import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "../Logger";

/**
 * 將任意資料以 JSON 輸出成報告檔。
 * 檔名格式：`<yyyyMMdd-HHmmss>-<name>.json`
 */
export class DumpWriterDefault {
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly dir = "dist/reports",
    private readonly now: () => Date = () => new Date()
  ) {
    this.logger = logger.extend("dump");
  }

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.dir, { recursive: true });
    const fileName = `${format(this.now(), "yyyyMMdd-HHmmss")}-${name}.json`;
    const filePath = path.join(this.dir, fileName);
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "📝" })`已輸出報告 ${filePath}`;
    return filePath;
  }
}
