import { serve } from "@hono/node-server";
import app from "./index";
import { loadConfig } from "./config";
import { createBindings } from "./env";
import { configureLogging, getAppLogger } from "./logger";

async function main(): Promise<void> {
  const config = loadConfig();
  await configureLogging({ level: config.logLevel, logFile: config.logFile });

  const logger = getAppLogger("server");
  const bindings = createBindings(config);

  serve(
    {
      fetch: (request) => app.fetch(request, bindings),
      port: config.port,
    },
    (info) => {
      logger.info("Listening on http://localhost:{port}", { port: info.port });
    }
  );
}

main().catch((error: unknown) => {
  console.error("Server error:", error);
  process.exit(1);
});
