import { Type as t } from "@sinclair/typebox";

import { buildConfigFactoryEnv } from "~shared/ConfigFactory";

import { defaultNameFormats, defaultStrategies } from "@/constants";

/** 命令列未指定時使用的預設值，可由環境變數覆寫 */
export const getAppConfig = buildConfigFactoryEnv(
  t.Object({
    METADATER_STRATEGIES: t.String({ default: defaultStrategies.join(",") }),
    METADATER_NAME_FORMATS: t.String({
      default: defaultNameFormats.join(","),
    }),
    METADATER_CONCURRENCY: t.Integer({ minimum: 1, default: 1 }),
  })
);
