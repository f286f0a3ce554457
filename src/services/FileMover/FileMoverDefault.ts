import { copyFile, mkdir, rename, unlink } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";

import type { ArrangePlan, MoveFile } from "@/types";
import { exists, formatBytes } from "@/utils/helper";

import {
  type ApplyOptions,
  type ApplyResult,
  type FileMover,
  emptyApplyResult,
} from "./FileMover";

export class FileMoverDefault implements FileMover {
  private readonly logger: Logger;

  constructor(deps: { logger: Logger }) {
    this.logger = deps.logger.extend("FileMoverDefault");
  }

  async apply(plan: ArrangePlan, options: ApplyOptions): Promise<ApplyResult> {
    const { dryRun } = options;
    const result = emptyApplyResult(dryRun);

    for (const removal of plan.removals) {
      if (dryRun) {
        this.logger.info({
          event: "would-remove",
          emoji: "🗑️",
        })`將刪除重複檔 ${removal.path} (${formatBytes(removal.sizeBytes)})`;
        result.removed++;
        result.bytesFreed += removal.sizeBytes;
        continue;
      }
      try {
        await unlink(removal.path);
        result.removed++;
        result.bytesFreed += removal.sizeBytes;
        this.logger.info({ event: "removed", emoji: "🗑️" })`已刪除 ${removal.path}`;
      } catch (error) {
        result.failures.push({
          path: removal.path,
          operation: "remove",
          message: toMessage(error),
        });
        this.logger.error({ event: "remove-failed", error })`刪除 ${removal.path} 失敗`;
      }
    }

    for (const folder of plan.folders) {
      if (dryRun) {
        this.logger.info({
          event: "would-create",
          emoji: "📁",
        })`將建立資料夾 ${folder.targetDir}`;
        result.createdFolders++;
      } else {
        try {
          await mkdir(folder.targetDir, { recursive: true });
          result.createdFolders++;
        } catch (error) {
          this.logger.error({
            event: "mkdir-failed",
            error,
          })`建立資料夾 ${folder.targetDir} 失敗，略過其中 ${folder.moves.length} 個檔案`;
          result.failures.push({
            path: folder.targetDir,
            operation: "mkdir",
            message: toMessage(error),
          });
          continue;
        }
      }
      const moved = await this.moveFiles(folder.moves, options);
      result.moved += moved.moved;
      result.failures.push(...moved.failures);
    }

    return result;
  }

  async moveFiles(moves: MoveFile[], options: ApplyOptions): Promise<ApplyResult> {
    const result = emptyApplyResult(options.dryRun);
    for (const move of moves) {
      if (options.dryRun) {
        this.logger.info({
          event: "would-move",
          emoji: "📦",
        })`將搬移 ${path.basename(move.from)} → ${move.to}`;
        result.moved++;
        continue;
      }
      try {
        // 不覆蓋既有檔案
        if (await exists(move.to)) {
          throw new Error(`目標已存在: ${move.to}`);
        }
        await moveFile(move.from, move.to);
        result.moved++;
        this.logger.info({
          event: "moved",
          emoji: "📦",
        })`${move.from} → ${move.to}`;
      } catch (error) {
        result.failures.push({
          path: move.from,
          operation: "move",
          message: toMessage(error),
        });
        this.logger.error({ event: "move-failed", error })`搬移 ${move.from} 失敗`;
      }
    }
    return result;
  }
}

async function moveFile(from: string, to: string) {
  try {
    await rename(from, to);
  } catch (error) {
    // 跨裝置時改為複製後刪除
    if (error instanceof Error && "code" in error && error.code === "EXDEV") {
      await copyFile(from, to);
      await unlink(from);
      return;
    }
    throw error;
  }
}

function toMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}
