import { createApp } from "./app";
import { loadEnv } from "./config/env";
import { errorMessage } from "./config/logger";

async function bootstrap(): Promise<void> {
  const env = loadEnv();
  const { app, logger } = createApp(env);

  const server = app.listen(env.port, () => {
    logger.info("Server started", { port: env.port, nodeEnv: env.nodeEnv });
  });

  const shutdown = (signal: string): void => {
    logger.info("Shutting down", { signal });
    server.close((error) => {
      if (error) {
        logger.error("Server close failed", { error: errorMessage(error) });
      }
      void logger.flush().finally(() => process.exit(error ? 1 : 0));
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

bootstrap().catch((error) => {
  process.stderr.write(`Failed to start server: ${errorMessage(error)}\n`);
  process.exit(1);
});
