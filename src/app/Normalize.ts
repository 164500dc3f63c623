import type { CAC } from "cac";

import { DumpWriterDefault } from "~shared/DumpWriter/DumpWriterDefault";
import type { Logger } from "~shared/Logger";
import { isErr } from "~shared/utils/Result";

import { getAppConfig } from "@/config";
import { BatchServiceDefault } from "@/services/BatchService";
import {
  type FilenamePattern,
  buildDefaultExtractors,
  compileFilenamePattern,
} from "@/services/Extractor";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { MetadataCodecPiexif } from "@/services/MetadataContainer";
import { MetadataReconcilerDefault } from "@/services/MetadataReconciler";
import { MetadataWriterDefault } from "@/services/MetadataWriter";
import { expandHome, splitList, toInt } from "@/utils/helper";

type NormalizeOptions = {
  strategies: string | string[];
  nameFormats: string | string[];
  concurrency: number | string;
  report?: string;
};

export function registerNormalize(cli: CAC, baseLogger: Logger) {
  const config = getAppConfig();

  cli
    .command(
      "<in> <out>",
      "整合 EXIF、sidecar JSON 與檔名中的拍攝時間與位置，寫入輸出目錄中的複本"
    )
    .option(
      "-s, --strategies <list>",
      "策略（逗號分隔，越前面優先權越高）：exif, json, filename",
      { default: config.METADATER_STRATEGIES }
    )
    .option(
      "-n, --name-formats <list>",
      "filename 策略使用的檔名格式（逗號分隔，strftime 語法）",
      { default: config.METADATER_NAME_FORMATS }
    )
    .option("-c, --concurrency <n>", "同時處理的檔案數", {
      default: config.METADATER_CONCURRENCY,
    })
    .option("--report <dir>", "將處理結果以 JSON 輸出到指定目錄")
    .action(async (input: string, output: string, options: NormalizeOptions) => {
      const logger = baseLogger.extend("normalize", { emoji: "🗂️" });

      const nameFormats: FilenamePattern[] = [];
      for (const source of splitList(options.nameFormats)) {
        const compiled = compileFilenamePattern(source);
        if (isErr(compiled)) {
          logger.error({ error: compiled.error })`檔名格式不合法：${source}`;
          process.exitCode = 1;
          return;
        }
        nameFormats.push(compiled.value);
      }

      const codec = new MetadataCodecPiexif();
      const reconciler = new MetadataReconcilerDefault({
        extractors: buildDefaultExtractors({ logger, nameFormats }),
        logger,
      });
      const service = new BatchServiceDefault({
        scanner: new FileSystemScannerDefault(),
        codec,
        reconciler,
        writer: new MetadataWriterDefault({ logger }),
        logger,
      });

      const result = await service.run({
        inputDir: expandHome(input),
        outputDir: expandHome(output),
        strategies: splitList(options.strategies),
        concurrency: Math.max(1, toInt(options.concurrency, 1)),
      });
      if (isErr(result)) {
        logger.error({
          event: result.error.type,
          error: result.error,
        })`${result.error.message}`;
        process.exitCode = 1;
        return;
      }

      if (options.report) {
        await new DumpWriterDefault(logger, expandHome(options.report)).dump(
          "metadater",
          result.value
        );
      }
      if (result.value.failed > 0) process.exitCode = 1;
    });
}
