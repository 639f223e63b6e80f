import { serve } from "@hono/node-server";
import { env, engineConfigFromEnv } from "./config/env.ts";
import { resolveRiskEngineConfig } from "./config/risk-config.ts";
import { loadReferenceData } from "./services/reference-data.ts";
import { createRiskEngine } from "./agents/risk-engine.ts";
import { configureLogger, logger, timeOperation } from "./services/structured-logger.ts";
import { toError } from "./lib/errors.ts";
import { createApp } from "./app.ts";

async function main(): Promise<void> {
  configureLogger({
    ...(env.LOG_LEVEL && { minLevel: env.LOG_LEVEL }),
    ...(env.LOG_FORMAT && { jsonOutput: env.LOG_FORMAT === "json" }),
  });

  const config = resolveRiskEngineConfig(engineConfigFromEnv(env));
  const { result: reference } = await timeOperation("server", "Load reference data", () =>
    loadReferenceData({
      scenariosPath: env.SCENARIOS_PATH,
      categoriesPath: env.CATEGORY_MAPPINGS_PATH,
      pricesPath: env.PRICE_HISTORY_PATH,
    }),
  );

  const engine = createRiskEngine({
    config,
    reference,
    referenceSymbol: env.REFERENCE_SYMBOL,
  });
  const app = createApp(engine);

  serve(
    {
      fetch: app.fetch,
      port: env.PORT,
    },
    (info) => {
      logger.info("server", `Risk synthesis engine listening on port ${info.port}`, {
        knowledgeBackend: config.knowledgeBackend,
        referenceSymbol: env.REFERENCE_SYMBOL,
      });
    },
  );
}

main().catch((err: unknown) => {
  logger.fatal("server", "Startup failed", toError(err));
  process.exit(1);
});
