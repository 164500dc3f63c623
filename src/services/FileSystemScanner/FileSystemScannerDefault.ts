import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { pathKind } from "@/utils/helper";

import {
  type FileSystemScanner,
  type ScanError,
  type ScannedEntry,
} from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(rootPath: string): Promise<Result<ScannedEntry[], ScanError>> {
    try {
      const dirents = await readdir(rootPath, { withFileTypes: true });
      const entries = await Promise.all(
        dirents.map(async (d): Promise<ScannedEntry> => {
          const fullPath = path.join(rootPath, d.name);
          const isFile =
            d.isFile() ||
            (d.isSymbolicLink() && (await pathKind(fullPath)) === "file");
          return { fullPath, name: d.name, isFile };
        })
      );
      return ok(entries.sort((a, b) => a.name.localeCompare(b.name)));
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}
