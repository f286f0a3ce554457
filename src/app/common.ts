import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import type { ApplyResult } from "@/services/FileMover";
import { expandHome, formatBytes, isDirectory } from "@/utils/helper";

export type UsageError =
  | { type: "NOT_A_DIRECTORY"; message: string }
  | { type: "SCAN_FAILED"; message: string };

export type CommandOptions = {
  dryRun?: boolean;
};

/** 解析並確認來源資料夾存在，否則為使用錯誤 */
export async function resolveFolder(
  folder: string,
  logger: Logger
): Promise<Result<string, UsageError>> {
  const root = expandHome(folder);
  if (!(await isDirectory(root))) {
    const message = `${root} 不是資料夾`;
    logger.error({ emoji: "❌", event: "usage" }, message);
    return err({ type: "NOT_A_DIRECTORY", message });
  }
  return ok(root);
}

export function logApplyResult(logger: Logger, result: ApplyResult) {
  if (result.dryRun) {
    logger.info({
      event: "done",
      emoji: "🧪",
      folders: result.createdFolders,
      moved: result.moved,
      removed: result.removed,
      bytesFreed: result.bytesFreed,
    })`試跑完成：將建立 ${result.createdFolders} 個資料夾、搬移 ${result.moved} 個檔案、刪除 ${result.removed} 個重複檔（釋放 ${formatBytes(result.bytesFreed)}）`;
    return;
  }
  if (result.failures.length > 0) {
    logger.warn({
      event: "partial",
      failed: result.failures.length,
    })`部分完成：${result.failures.length} 個項目失敗，其餘已處理`;
  }
  logger.info({
    event: "done",
    emoji: "✅",
    folders: result.createdFolders,
    moved: result.moved,
    removed: result.removed,
    bytesFreed: result.bytesFreed,
  })`完成：建立 ${result.createdFolders} 個資料夾、搬移 ${result.moved} 個檔案、刪除 ${result.removed} 個重複檔（釋放 ${formatBytes(result.bytesFreed)}）`;
}
