import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";

import { registerArrangeTrips } from "./app/ArrangeTrips";
import { registerDedup } from "./app/Dedup";
import { registerInspectExif } from "./app/InspectExif";
import { registerRenameByDate } from "./app/RenameByDate";

const logger = createDefaultLoggerFromEnv();
const cli = cac("photo-tidy");

registerRenameByDate(cli, logger);
registerDedup(cli, logger);
registerArrangeTrips(cli, logger);
registerInspectExif(cli, logger);

cli.help();
cli.parse(process.argv, { run: false });

if (!cli.matchedCommand) {
  cli.outputHelp();
  await logger[Symbol.asyncDispose]();
  process.exit(0);
}

try {
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exitCode = 1;
} finally {
  await logger[Symbol.asyncDispose]();
}
