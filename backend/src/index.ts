import { createApp } from "./app";
import { loadConfig } from "./config";
import { createLogger } from "./logger";
import { DoseTableStore } from "./table/doseTableStore";

async function main() {
  const config = loadConfig();
  const log = createLogger(config.logLevel);

  const store = await DoseTableStore.open(config.tablePath, log);
  const app = createApp(store, log);

  // SIGHUP re-reads the table file and swaps it in once fully built.
  process.on("SIGHUP", () => {
    store
      .reload()
      .then(({ source, published }) =>
        published
          ? log.info(`Dose table reloaded (${source})`)
          : log.warn("Dose table reload superseded by a newer one")
      )
      .catch((err: unknown) => log.error("Dose table reload failed", err));
  });

  app.listen(config.port, () => log.info(`API listening on :${config.port}`));
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
