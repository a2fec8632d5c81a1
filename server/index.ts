import { baseUrl, loadConfig } from "./config";
import { createApp } from "./app";
import { log } from "./log";
import { createPortal } from "./portal";
import { seed } from "./seed";

async function main() {
  const config = loadConfig();
  const portal = createPortal(config);

  await seed(portal);

  const { httpServer } = await createApp(portal);
  httpServer.listen(config.port, () => {
    log(`serving on ${baseUrl(config)}`);
    if (config.debug) {
      log(`data in ${config.dataDir}, uploads in ${config.uploadDir}`);
    }
  });
}

main().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
