import { mkdir, rm, symlink, writeFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { describe, expect, test } from "vitest";

import { expectOk } from "~shared/testkit/ExpectResult";

import { FileSystemScannerDefault } from "@/services/FileSystemScanner";

const tmpDir = "test/tmp/scanner";

describe("FileSystemScannerDefault", () => {
  test("只列出第一層，依名稱排序，並標示是否為檔案", async () => {
    await rm(tmpDir, { recursive: true, force: true });
    await mkdir(join(tmpDir, "subdir"), { recursive: true });
    await writeFile(join(tmpDir, "b.jpg"), "b");
    await writeFile(join(tmpDir, "a.jpg"), "a");
    await writeFile(join(tmpDir, ".hidden"), "h");
    await writeFile(join(tmpDir, "subdir", "c.jpg"), "c");
    await symlink(resolve(tmpDir, "a.jpg"), join(tmpDir, "link.jpg"));

    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan(tmpDir);

    expectOk(result);
    expect(result.value).toEqual([
      { fullPath: join(tmpDir, ".hidden"), name: ".hidden", isFile: true },
      { fullPath: join(tmpDir, "a.jpg"), name: "a.jpg", isFile: true },
      { fullPath: join(tmpDir, "b.jpg"), name: "b.jpg", isFile: true },
      { fullPath: join(tmpDir, "link.jpg"), name: "link.jpg", isFile: true },
      { fullPath: join(tmpDir, "subdir"), name: "subdir", isFile: false },
    ]);
  });

  test("遇到不存在的路徑應回傳錯誤", async () => {
    const scanner = new FileSystemScannerDefault();
    const result = await scanner.scan("no_such_path");
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.type).toBe("SCAN_FAILED");
    }
  });
});
