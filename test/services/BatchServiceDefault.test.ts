import { formatISO } from "date-fns";
import { mkdir, readFile, readdir, rm, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { beforeEach, describe, expect, test } from "vitest";

import { buildTestLogger } from "~shared/testkit/TestLogger";
import { expectErr, expectOk } from "~shared/testkit/ExpectResult";

import { defaultNameFormats, defaultStrategies } from "@/constants";
import {
  type BatchOptions,
  BatchServiceDefault,
} from "@/services/BatchService";
import {
  buildDefaultExtractors,
  compileFilenamePattern,
} from "@/services/Extractor";
import { FileSystemScannerDefault } from "@/services/FileSystemScanner";
import { MetadataCodecPiexif } from "@/services/MetadataContainer";
import { MetadataReconcilerDefault } from "@/services/MetadataReconciler";
import { MetadataWriterDefault } from "@/services/MetadataWriter";
import { buildJpeg, exifWith, newYorkGps } from "~test/fixture/jpeg";

const tmpDir = "test/tmp/batch";
const inDir = join(tmpDir, "in");
const outDir = join(tmpDir, "out");

function buildService() {
  const logger = buildTestLogger();
  const nameFormats = defaultNameFormats.map((source) => {
    const compiled = compileFilenamePattern(source);
    expectOk(compiled);
    return compiled.value;
  });
  return new BatchServiceDefault({
    scanner: new FileSystemScannerDefault(),
    codec: new MetadataCodecPiexif(),
    reconciler: new MetadataReconcilerDefault({
      extractors: buildDefaultExtractors({ logger, nameFormats }),
      logger,
    }),
    writer: new MetadataWriterDefault({ logger }),
    logger,
  });
}

function options(overrides: Partial<BatchOptions> = {}): BatchOptions {
  return {
    inputDir: inDir,
    outputDir: outDir,
    strategies: defaultStrategies,
    ...overrides,
  };
}

async function given(name: string, content: Buffer | string) {
  await writeFile(join(inDir, name), content);
}

beforeEach(async () => {
  await rm(tmpDir, { recursive: true, force: true });
  await mkdir(inDir, { recursive: true });
});

describe("BatchServiceDefault", () => {
  test("從檔名取得日期，設定輸出檔時間", async () => {
    await given("IMG_20230101_120000.jpg", buildJpeg());

    const result = await buildService().run(options());
    expectOk(result);
    const date = new Date(2023, 0, 1, 12, 0, 0);
    expect(result.value.files).toEqual([
      {
        status: "processed",
        name: "IMG_20230101_120000.jpg",
        date: formatISO(date),
        dateSource: "filename",
        location: undefined,
        locationSource: undefined,
        passthrough: true,
      },
    ]);

    const outputPath = join(outDir, "IMG_20230101_120000.jpg");
    expect(await readFile(outputPath)).toEqual(buildJpeg());
    expect((await stat(outputPath)).mtime.getTime()).toBe(date.getTime());
  });

  test("sidecar 提供日期與位置，寫入 EXIF", async () => {
    await given("a.jpg", buildJpeg(exifWith({})));
    await given(
      "a.jpg.json",
      JSON.stringify({
        photoTakenTime: { timestamp: "1000000000" },
        geoData: { latitude: 40.7128, longitude: -74.006 },
      })
    );

    const result = await buildService().run(options());
    expectOk(result);
    expect(result.value.processed).toBe(1);
    expect(result.value.skipped).toBe(1);

    const outcome = result.value.files.find((f) => f.name === "a.jpg");
    expect(outcome?.status).toBe("processed");
    if (outcome?.status === "processed") {
      expect(outcome.date).toBe("2001-09-09T01:46:40.000Z");
      expect(outcome.dateSource).toBe("json");
      expect(outcome.locationSource).toBe("json");
      expect(outcome.location?.latitude).toBeCloseTo(40.7128, 9);
      expect(outcome.location?.longitude).toBeCloseTo(-74.006, 9);
      expect(outcome.passthrough).toBe(false);
    }

    const written = new MetadataCodecPiexif().open(
      await readFile(join(outDir, "a.jpg"))
    );
    expectOk(written);
    expect(written.value.getDateTime()).toBe("2001:09:09 01:46:40");
    expect(written.value.getLocation()?.latitude.ref).toBe("N");
    expect(written.value.getLocation()?.longitude.ref).toBe("W");
  });

  test("EXIF 優先於 sidecar", async () => {
    await given(
      "b.jpg",
      buildJpeg(exifWith({ dateTime: "2019:05:04 10:20:30", gps: newYorkGps }))
    );
    await given(
      "b.jpg.json",
      JSON.stringify({
        photoTakenTime: { timestamp: "1000000000" },
        geoData: { latitude: 0, longitude: 0 },
      })
    );

    const result = await buildService().run(options());
    expectOk(result);
    const outcome = result.value.files.find((f) => f.name === "b.jpg");
    expect(outcome?.status).toBe("processed");
    if (outcome?.status === "processed") {
      expect(outcome.date).toBe(formatISO(new Date(2019, 4, 4, 10, 20, 30)));
      expect(outcome.dateSource).toBe("exif");
      expect(outcome.locationSource).toBe("exif");
    }
  });

  test("沒有任何資訊時輸出與原檔完全相同", async () => {
    const content = Buffer.from("plain bytes");
    await given("holiday.png", content);

    const result = await buildService().run(options());
    expectOk(result);
    expect(result.value.files).toEqual([
      {
        status: "processed",
        name: "holiday.png",
        date: undefined,
        dateSource: undefined,
        location: undefined,
        locationSource: undefined,
        passthrough: true,
      },
    ]);
    expect(await readFile(join(outDir, "holiday.png"))).toEqual(content);
  });

  test("隱藏檔、sidecar、GIF 與子目錄不輸出", async () => {
    await given(".hidden.jpg", "h");
    await given("notes.json", "{}");
    await given("anim.GIF", "g");
    await mkdir(join(inDir, "album"));
    await given("keep.jpg", "k");

    const result = await buildService().run(options());
    expectOk(result);
    expect(result.value.processed).toBe(1);
    expect(result.value.skipped).toBe(4);
    expect(result.value.failed).toBe(0);
    expect(await readdir(outDir)).toEqual(["keep.jpg"]);
  });

  test("sidecar 不合法時該檔失敗，其他檔案照常處理", async () => {
    await given("bad.jpg", "b");
    await given("bad.jpg.json", "{ broken");
    await given("good.jpg", "g");

    const result = await buildService().run(options());
    expectOk(result);
    expect(result.value.processed).toBe(1);
    expect(result.value.failed).toBe(1);

    const bad = result.value.files.find((f) => f.name === "bad.jpg");
    expect(bad?.status).toBe("failed");
    if (bad?.status === "failed") {
      expect(bad.error.type).toBe("SIDECAR_PARSE_FAILED");
    }
    expect(await readdir(outDir)).toEqual(["good.jpg"]);
  });

  test("只用 filename 策略時忽略 sidecar", async () => {
    await given("bad.jpg", "b");
    await given("bad.jpg.json", "{ broken");

    const result = await buildService().run(
      options({ strategies: ["filename"] })
    );
    expectOk(result);
    expect(result.value.processed).toBe(1);
    expect(result.value.failed).toBe(0);
  });

  test("併發處理結果與逐一處理相同", async () => {
    for (let i = 1; i <= 5; i++) {
      await given(`IMG_2023010${i}_120000.jpg`, buildJpeg());
    }

    const result = await buildService().run(options({ concurrency: 3 }));
    expectOk(result);
    expect(result.value.processed).toBe(5);
    expect(result.value.files.map((f) => f.name)).toEqual([
      "IMG_20230101_120000.jpg",
      "IMG_20230102_120000.jpg",
      "IMG_20230103_120000.jpg",
      "IMG_20230104_120000.jpg",
      "IMG_20230105_120000.jpg",
    ]);
    expect((await readdir(outDir)).sort()).toEqual(
      result.value.files.map((f) => f.name)
    );
  });

  test("輸出目錄不存在時自動建立（含上層）", async () => {
    const nested = join(tmpDir, "deep", "out");
    const result = await buildService().run(options({ outputDir: nested }));
    expectOk(result);
    expect((await stat(nested)).isDirectory()).toBe(true);
  });

  test("輸入目錄不存在", async () => {
    const result = await buildService().run(
      options({ inputDir: join(tmpDir, "missing") })
    );
    expectErr(result);
    expect(result.error.type).toBe("INPUT_NOT_FOUND");
  });

  test("輸入不是目錄", async () => {
    await given("a.jpg", "a");
    const result = await buildService().run(
      options({ inputDir: join(inDir, "a.jpg") })
    );
    expectErr(result);
    expect(result.error.type).toBe("INPUT_NOT_DIRECTORY");
  });

  test("輸出不是目錄時不處理任何檔案", async () => {
    await given("IMG_20230101_120000.jpg", buildJpeg());
    const outputFile = join(tmpDir, "out-file");
    await writeFile(outputFile, "x");

    const result = await buildService().run(
      options({ outputDir: outputFile })
    );
    expectErr(result);
    expect(result.error.type).toBe("OUTPUT_NOT_DIRECTORY");
    expect(await readFile(outputFile, "utf8")).toBe("x");
  });
});
