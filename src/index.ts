import { buildApp } from "./server.js";
import { loadRuntimeConfig } from "./infra/config.js";

const config = loadRuntimeConfig();
const app = buildApp(config);

app
  .listen({ port: config.port, host: config.host })
  .then(() => {
    app.log.info(
      { provider: config.providerBackend, storage: config.storageBackend, moncash_mode: config.moncash.mode },
      "marketplace payments API started",
    );
  })
  .catch((error: unknown) => {
    app.log.fatal({ err: error }, "failed to start marketplace payments API");
    process.exit(1);
  });
