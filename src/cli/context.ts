import { CallExecutor } from "../client/executor.js";
import { refreshViaOAuthServer, TokenRefresher } from "../client/token-refresher.js";
import type { TenantIdentity } from "../client/types.js";
import { loadRelayConfig, loadTenantFromEnv, type RelayConfig } from "../config/config.js";
import { createRateLimiter } from "../limits/rate-limiter.js";

export interface RelayContext {
  config: RelayConfig;
  tenant: TenantIdentity;
  executor: CallExecutor;
}

export interface RelayContextOptions {
  /** Attach the refresh-token grant hook (oauth tenants only). */
  autoRefresh?: boolean;
}

/** Wire config, tenant, limiter and refresher into one executor. */
export function createRelayContext(
  env: NodeJS.ProcessEnv = process.env,
  opts: RelayContextOptions = {},
): RelayContext {
  const config = loadRelayConfig(env);
  const { tenant, credentials } = loadTenantFromEnv(env);
  const refresher =
    opts.autoRefresh && tenant.authMode === "oauth"
      ? new TokenRefresher(
          refreshViaOAuthServer({
            tokenUrl: config.oauth.tokenUrl,
            clientId: config.oauth.clientId,
            clientSecret: config.oauth.clientSecret,
            timeoutMs: config.timeoutMs,
          }),
        )
      : null;

  const executor = new CallExecutor(tenant, {
    credentials,
    rateLimiter: createRateLimiter(config.rateLimiter),
    refresher,
    maxAttempts: config.maxAttempts,
    timeoutMs: config.timeoutMs,
  });
  return { config, tenant, executor };
}
