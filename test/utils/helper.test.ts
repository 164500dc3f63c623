import { mkdir, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { beforeAll, describe, expect, test } from "vitest";

import { pathKind, splitList, toInt } from "@/utils/helper";

const tmpDir = "test/tmp/helper";

describe("helper", () => {
  beforeAll(async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(tmpDir, { recursive: true });
    await writeFile(join(tmpDir, "a.txt"), "a");
  });

  test("splitList 去除空白與空項目", () => {
    expect(splitList(" exif, json ,,filename ")).toEqual([
      "exif",
      "json",
      "filename",
    ]);
  });

  test("splitList 合併重複給的選項", () => {
    expect(splitList(["exif,json", "filename"])).toEqual([
      "exif",
      "json",
      "filename",
    ]);
  });

  test("toInt", () => {
    expect(toInt("4", 1)).toBe(4);
    expect(toInt(3, 1)).toBe(3);
    expect(toInt("abc", 1)).toBe(1);
    expect(toInt(undefined, 2)).toBe(2);
  });

  test("pathKind", async () => {
    expect(await pathKind(tmpDir)).toBe("directory");
    expect(await pathKind(join(tmpDir, "a.txt"))).toBe("file");
    expect(await pathKind(join(tmpDir, "missing"))).toBeUndefined();
  });
});
