import { readdir } from "node:fs/promises";
import path from "node:path";

import { type Result, err, ok } from "~shared/utils/Result";

import { compareCodeUnits } from "@/utils/helper";

import type { FileSystemScanner, ScanError, ScanOptions } from "./FileSystemScanner";

export class FileSystemScannerDefault implements FileSystemScanner {
  async scan(
    rootPath: string,
    options?: ScanOptions
  ): Promise<Result<string[], ScanError>> {
    const allowExts = options?.allowExts ?? [];
    const isRecursive = options?.recursive ?? false;
    const allowExtsSet = new Set(
      allowExts.map((e) =>
        e.startsWith(".") ? e.toLowerCase() : `.${e.toLowerCase()}`
      )
    );
    try {
      const files = await walk(rootPath, isRecursive);
      const fullPaths = files
        .filter((p) => {
          if (allowExtsSet.size === 0) return true;
          return allowExtsSet.has(path.extname(p).toLowerCase());
        })
        .sort(compareCodeUnits);
      return ok(fullPaths);
    } catch (e) {
      return err({
        type: "SCAN_FAILED",
        message: e instanceof Error ? e.message : String(e),
      });
    }
  }
}

async function walk(dir: string, recursive: boolean): Promise<string[]> {
  const dirents = await readdir(dir, { withFileTypes: true });
  const result: string[] = [];
  for (const d of dirents) {
    const fullPath = path.join(dir, d.name);
    if (d.isFile()) {
      result.push(fullPath);
    } else if (recursive && d.isDirectory()) {
      result.push(...(await walk(fullPath, recursive)));
    }
  }
  return result;
}
