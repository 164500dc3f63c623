import { formatISO } from "date-fns";
import kleur from "kleur";
import { mkdir } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { CaptureDate } from "@/types";
import { formatDecimal, toDecimal } from "@/utils/coordinates";
import { pathKind } from "@/utils/helper";
import { mapPool } from "@/utils/pool";

import type { FileSystemScanner, ScannedEntry } from "../FileSystemScanner";
import type { MetadataCodec } from "../MetadataContainer";
import { type MetadataReconciler, skipReason } from "../MetadataReconciler";
import type { MetadataWriter } from "../MetadataWriter";
import { SourceFile } from "../SourceFile";
import type {
  BatchOptions,
  BatchService,
  BatchSummary,
  FileError,
  FileOutcome,
  PreflightError,
} from "./BatchService";

type ProcessedOutcome = Extract<FileOutcome, { status: "processed" }>;

function toIso(date: CaptureDate) {
  return date.zone === "utc"
    ? date.value.toISOString()
    : formatISO(date.value);
}

export class BatchServiceDefault implements BatchService {
  private readonly scanner: FileSystemScanner;
  private readonly codec: MetadataCodec;
  private readonly reconciler: MetadataReconciler;
  private readonly writer: MetadataWriter;
  private readonly logger: Logger;

  constructor(deps: {
    scanner: FileSystemScanner;
    codec: MetadataCodec;
    reconciler: MetadataReconciler;
    writer: MetadataWriter;
    logger: Logger;
  }) {
    this.scanner = deps.scanner;
    this.codec = deps.codec;
    this.reconciler = deps.reconciler;
    this.writer = deps.writer;
    this.logger = deps.logger.extend("batch");
  }

  async run(
    options: BatchOptions
  ): Promise<Result<BatchSummary, PreflightError>> {
    const prepared = await this.prepare(options);
    if (!prepared.ok) return prepared;

    const scanned = await this.scanner.scan(options.inputDir);
    if (!scanned.ok) return scanned;
    const entries = scanned.value;

    this.logger.info({
      event: "start",
      strategies: options.strategies.join(","),
    })`開始處理 ${options.inputDir} → ${options.outputDir}，共 ${entries.length} 個項目`;

    const files = await mapPool(entries, options.concurrency ?? 1, (entry) =>
      this.processOne(entry, options)
    );

    const count = (status: FileOutcome["status"]) =>
      files.filter((f) => f.status === status).length;
    const summary: BatchSummary = {
      inputDir: options.inputDir,
      outputDir: options.outputDir,
      processed: count("processed"),
      skipped: count("skipped"),
      failed: count("failed"),
      files,
    };

    this.logger.info({
      event: "done",
      processed: summary.processed,
      skipped: summary.skipped,
      failed: summary.failed,
    })`處理完成：成功 ${summary.processed}，略過 ${summary.skipped}，失敗 ${summary.failed}`;
    return ok(summary);
  }

  /** 檢查輸入輸出目錄，並在處理任何檔案前建立輸出目錄 */
  private async prepare(
    options: BatchOptions
  ): Promise<Result<void, PreflightError>> {
    const inputKind = await pathKind(options.inputDir);
    if (!inputKind) {
      return err({
        type: "INPUT_NOT_FOUND",
        message: `輸入目錄不存在：${options.inputDir}`,
      });
    }
    if (inputKind !== "directory") {
      return err({
        type: "INPUT_NOT_DIRECTORY",
        message: `輸入路徑不是目錄：${options.inputDir}`,
      });
    }

    const outputKind = await pathKind(options.outputDir);
    if (outputKind && outputKind !== "directory") {
      return err({
        type: "OUTPUT_NOT_DIRECTORY",
        message: `輸出路徑不是目錄：${options.outputDir}`,
      });
    }

    try {
      await mkdir(options.outputDir, { recursive: true });
    } catch (e) {
      return err({
        type: "OUTPUT_CREATE_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
    return ok();
  }

  private async processOne(
    entry: ScannedEntry,
    options: BatchOptions
  ): Promise<FileOutcome> {
    const reason = skipReason(entry);
    if (reason) {
      this.logger.debug({ event: "skip", reason })`略過 ${entry.name}`;
      return { status: "skipped", name: entry.name, reason };
    }

    const file = new SourceFile(entry.fullPath, this.codec);
    try {
      const reconciled = await this.reconciler.reconcile(
        file,
        options.strategies
      );
      if (!reconciled.ok) return this.fail(entry.name, reconciled.error);

      const metadata = reconciled.value;
      const written = await this.writer.write({
        metadata,
        source: file,
        outputPath: path.join(options.outputDir, entry.name),
      });
      if (!written.ok) return this.fail(entry.name, written.error);

      const outcome: ProcessedOutcome = {
        status: "processed",
        name: entry.name,
        date: metadata.date && toIso(metadata.date),
        dateSource: metadata.dateSource,
        location: metadata.location && toDecimal(metadata.location),
        locationSource: metadata.locationSource,
        passthrough: written.value.passthrough,
      };
      this.report(outcome);
      return outcome;
    } catch (e) {
      return this.fail(entry.name, {
        type: "UNEXPECTED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }

  private fail(name: string, error: FileError): FileOutcome {
    this.logger.error({ event: "failed", file: name, error })`${name} 處理失敗：${error.message}`;
    return { status: "failed", name, error };
  }

  /** 每個檔案一行：檔名 => 日期, 位置 */
  private report(outcome: ProcessedOutcome) {
    const dateText = outcome.date
      ? kleur.green(`${outcome.date} (${outcome.dateSource})`)
      : kleur.red("無日期");
    const locationText = outcome.location
      ? kleur.green(
          `${formatDecimal(outcome.location)} (${outcome.locationSource})`
        )
      : kleur.red("無位置");
    this.logger.info(
      { event: "file", emoji: "📷" },
      `${kleur.bold().cyan(outcome.name)} => ${dateText}, ${locationText}`
    );
  }
}
