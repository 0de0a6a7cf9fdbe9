import { buildApp } from "./app";
import { loadConfig } from "./config";

async function main() {
  const config = loadConfig();
  const app = await buildApp();

  try {
    await app.listen({ host: config.HTTP_HOST, port: config.HTTP_PORT });
    app.log.info(
      { http: `${config.HTTP_HOST}:${config.HTTP_PORT}` },
      "Catalog service ready"
    );
  } catch (error) {
    app.log.error({ err: error }, "Failed to start catalog service");
    await app.close();
    process.exit(1);
  }

  const shutdown = async (signal: NodeJS.Signals) => {
    app.log.info({ signal }, "Shutting down catalog service");
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, "Error during shutdown");
      process.exit(1);
    }
  };

  process.on("SIGTERM", (signal) => void shutdown(signal));
  process.on("SIGINT", (signal) => void shutdown(signal));
}

void main();
