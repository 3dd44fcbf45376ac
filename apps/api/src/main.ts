import "reflect-metadata";
import "dotenv/config";

import { loadRuntimeConfig, writeStructuredLog } from "@imagetext/utils";
import { NestFactory } from "@nestjs/core";
import { HttpAdapterHost } from "@nestjs/core";

import { AppModule } from "./app.module.js";
import { SentryExceptionFilter } from "./sentry.exception-filter.js";
import { captureException, flushSentry, initSentry } from "./sentry.js";

async function bootstrap(): Promise<void> {
  const config = loadRuntimeConfig();
  initSentry(config.sentryDsn);

  const app = await NestFactory.create(AppModule);
  app.enableCors({ origin: true });

  const httpAdapterHost = app.get(HttpAdapterHost);
  app.useGlobalFilters(new SentryExceptionFilter(httpAdapterHost));
  await app.listen(config.port);
  writeStructuredLog({
    level: "info",
    message: "api: listening",
    context: { port: config.port, rasterizer: config.rasterizer, fontsDir: config.fontsDir }
  });
}

void bootstrap().catch(async (error) => {
  captureException(error, { stage: "bootstrap" });
  await flushSentry().catch(() => undefined);
  writeStructuredLog({
    level: "error",
    message: "api: bootstrap failed",
    context: { error: error instanceof Error ? error.message : String(error) }
  });
  process.exit(1);
});
