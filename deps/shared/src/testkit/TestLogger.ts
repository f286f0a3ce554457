import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "../ConfigFactory";
import { LoggerConsole } from "../Logger";

const getTestLoggerConfig = buildConfigFactoryEnv(
  t.Object({
    TEST_LOG_LEVEL: t.Union(
      [
        t.Literal("trace"),
        t.Literal("debug"),
        t.Literal("info"),
        t.Literal("warn"),
        t.Literal("error"),
        t.Literal("silent"),
      ],
      { default: "silent" }
    ),
  })
);

/** 測試用 logger，預設不輸出，需要時以 TEST_LOG_LEVEL 打開 */
export function buildTestLogger() {
  return new LoggerConsole(getTestLoggerConfig().TEST_LOG_LEVEL, ["test"]);
}
