import { env } from "./config/env.js";
import { buildApp } from "./app.js";
import { log } from "./logger.js";

async function main() {
  const app = await buildApp();

  try {
    const address = await app.listen({
      port: env.port,
      host: env.host,
    });

    app.log.info(`Server running at ${address}`);
  } catch (error) {
    app.log.error(error, "Failed to start server");
    process.exitCode = 1;
  }
}

main().catch((error: unknown) => {
  log.fatal({ err: error }, "Failed to initialize server");
  process.exitCode = 1;
});
