import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

export const getAppConfig = buildConfigFactoryEnv(
  t.Object({
    GEOCODER_USER_AGENT: t.String({ default: "photo-tidy/0.1 (personal photo library)" }),
  })
);
