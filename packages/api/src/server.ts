import { createHTTPServer } from "@trpc/server/adapters/standalone";
import cors from "cors";
import { createLogger, describeError, loadConfig, setLogLevel } from "@agora/core";
import { SqliteEventJournal } from "@agora/storage";
import { appRouter } from "./app-router.js";
import { SimulationService } from "./simulation-service.js";
import type { Context } from "./trpc.js";

const log = createLogger("server");

const PORT = Number(process.env["PORT"]) || 3001;

function main(): void {
  const config = loadConfig();
  setLogLevel(config.log.level);

  const domain = process.env["AGORA_DOMAIN"] ?? "senate";
  const journal = new SqliteEventJournal(process.env["AGORA_JOURNAL_PATH"] ?? ":memory:");
  const simulation = new SimulationService({
    domain,
    config,
    journal,
    memoryDir: process.env["AGORA_MEMORY_DIR"],
  });
  simulation.engine.bus.start();

  const server = createHTTPServer({
    middleware: cors(),
    router: appRouter,
    createContext: (): Context => ({ simulation }),
  });

  server.listen(PORT);
  log.info("API server listening", { url: `http://localhost:${PORT}`, domain, seed: config.simulation.seed });

  process.on("SIGINT", () => {
    simulation.stop();
    server.close();
  });
}

try {
  main();
} catch (err) {
  log.error("API server failed to start", { error: describeError(err) });
  process.exitCode = 1;
}
