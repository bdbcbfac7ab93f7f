import { loadRuntimeConfig } from "../src/infra/config.js";
import { buildApp } from "../src/server.js";

// Cron entry point: runs one reconciliation poll through the API surface, without listening.
async function main(): Promise<void> {
  const config = loadRuntimeConfig();
  const app = buildApp(config);
  const apiKey = config.apiKeys[0];
  if (!apiKey) {
    throw new Error("At least one API key must be configured.");
  }

  try {
    const response = await app.inject({
      method: "POST",
      url: "/v1/admin/reconciliation/poll",
      headers: { authorization: `Bearer ${apiKey}` },
      payload: { limit: config.pollBatchSize },
    });
    if (response.statusCode !== 200) {
      throw new Error(`poll:pending failed with status ${response.statusCode}: ${response.body}`);
    }
    app.log.info({ summary: response.json() }, "poll:pending finished");
  } finally {
    await app.close();
  }
}

await main();
