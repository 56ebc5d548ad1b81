import { ApiClient } from "./apiClient.js";
import { BrowserAuthenticator } from "./authenticator.js";
import { PlaywrightBrowserSession } from "./browserSession.js";
import type { SyncConfig } from "./config.js";
import { ExportWriter } from "./exportWriter.js";
import { SessionInventory } from "./inventory.js";
import { ReconciliationEngine } from "./reconcile.js";
import { TokenCache } from "./tokenCache.js";

export interface Services {
  config: SyncConfig;
  cache: TokenCache;
  api: ApiClient;
  inventory: SessionInventory;
  writer: ExportWriter;
  engine: ReconciliationEngine;
}

export function createServices(config: SyncConfig): Services {
  const cache = new TokenCache({ dir: config.tokenDir, ttlDays: config.tokenTtlDays });

  const authenticator = new BrowserAuthenticator({
    loginTimeoutMs: config.loginTimeoutMs,
    formTimeoutMs: config.formTimeoutMs,
    openSession: ({ interactive }) =>
      PlaywrightBrowserSession.launch({
        headless: !interactive && !config.headed,
        channel: config.browserChannel,
        executablePath: config.browserPath
      })
  });

  const api = new ApiClient({ cache, authenticator, endpoint: config.apiUrl });
  const inventory = new SessionInventory(config.dataDir);
  const writer = new ExportWriter(config.dataDir);
  const engine = new ReconciliationEngine({ api, writer, timezone: config.timezone });

  return { config, cache, api, inventory, writer, engine };
}
