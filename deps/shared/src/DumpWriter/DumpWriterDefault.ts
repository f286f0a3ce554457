import { format } from "date-fns";
import { mkdir, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";

import type { Logger } from "../Logger";
import type { DumpWriter } from "./DumpWriter";

export const defaultReportDir = path.join(os.tmpdir(), "photo-tidy", "reports");

export class DumpWriterDefault implements DumpWriter {
  private readonly logger: Logger;

  constructor(
    logger: Logger,
    private readonly reportDir: string = defaultReportDir,
    private readonly now: () => Date = () => new Date()
  ) {
    this.logger = logger.extend("dump");
  }

  async dump(name: string, data: unknown): Promise<string> {
    await mkdir(this.reportDir, { recursive: true });
    const fileName = `${format(this.now(), "yyyyMMdd-HHmmss")}-${toSafeName(name)}.json`;
    const filePath = path.join(this.reportDir, fileName);
    await writeFile(filePath, JSON.stringify(data, null, 2), "utf8");
    this.logger.info({ emoji: "📝", filePath })`報告已輸出: ${filePath}`;
    return filePath;
  }
}

function toSafeName(name: string) {
  return name.replace(/[\\/:*?"<>|\s]+/g, "_");
}
