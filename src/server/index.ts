import { ConfigError, loadConfig, type AppConfig } from "../config.js";
import { closeConnection, getDb } from "../db/connection.js";
import { runMigration } from "../db/migrate.js";
import { serverLogger } from "../logger.js";
import { createServices } from "../services/index.js";
import { buildApp } from "./app.js";

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      serverLogger.fatal({ issues: error.issues }, error.message);
    } else {
      serverLogger.fatal({ error }, "Failed to load configuration");
    }
    process.exit(1);
  }
}

const config = readConfig();

const db = getDb(config.databaseUrl);
await runMigration(db);

const services = createServices(db, config);
const app = await buildApp(services);

// Start server
try {
  await app.listen({ port: config.server.port, host: config.server.host });
  app.log.info(
    { host: config.server.host, port: config.server.port },
    "Server started"
  );
} catch (err) {
  app.log.error(err, "Failed to start server");
  await closeConnection();
  process.exit(1);
}

if (config.sync.schedulerEnabled) {
  services.scheduler.start();
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    app.log.info({ signal }, "Shutting down");
    app
      .close()
      .then(() => closeConnection())
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        app.log.error(error, "Shutdown failed");
        process.exit(1);
      });
  });
}
