import { mkdirSync } from "node:fs";
import { type Options, type RotatingFileStream, createStream } from "rotating-file-stream";

import type { LogRecord, LogTransport } from "./Logger";

export type RfsTransportOptions = {
  filename: string;
  rfs?: Options;
};

/** 以 JSON Lines 寫入輪替檔案 */
export class RfsTransport implements LogTransport {
  private readonly stream: RotatingFileStream;

  constructor(options: RfsTransportOptions) {
    const rfsOptions: Options = {
      size: "10M",
      maxFiles: 14,
      ...options.rfs,
    };
    if (rfsOptions.path) mkdirSync(rfsOptions.path, { recursive: true });
    this.stream = createStream(options.filename, rfsOptions);
  }

  write(record: LogRecord) {
    this.stream.write(JSON.stringify(record) + "\n");
  }

  async [Symbol.asyncDispose]() {
    await new Promise<void>((resolve, reject) => {
      this.stream.once("error", reject);
      this.stream.end(() => resolve());
    });
  }
}
