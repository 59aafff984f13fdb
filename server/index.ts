import { createApp } from "./app";
import { loadConfig } from "./config";
import { createPool, initDb } from "./db";
import { PgHealthStore } from "./health-store";

async function main(): Promise<void> {
  const config = loadConfig();
  const pool = createPool(config.databaseUrl);
  await initDb(pool);

  const { server } = createApp({ store: new PgHealthStore(pool), config });

  const shutdown = () => {
    console.log("[server] shutting down");
    server.close(() => {
      pool.end().catch((err: unknown) => console.error("pool shutdown error:", err));
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  server.listen(config.port, () => {
    console.log(`[server] listening on port ${config.port} (week grouping: ${config.weekGrouping})`);
  });
}

main().catch((err: unknown) => {
  console.error("[server] failed to start:", err);
  process.exit(1);
});
