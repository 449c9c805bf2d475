/**
 * Singleflight oauth refresh.
 *
 * When a burst of concurrent calls hits `expired_token`, only the first one
 * runs the refresh hook. The others wait for that refresh to settle and then
 * retry their request, assuming the holder stored a fresh pair.
 */

import { logger } from "@elizaos/core";
import type { CredentialState } from "./credentials.js";
import { hasSecret, redactSecret } from "../security/secrets.js";
import { ApiError, describeError } from "./errors.js";
import type { TenantIdentity, TokenPair } from "./types.js";
import { tenantKey } from "./types.js";
import { isRecord } from "../utils/records.js";

export type RefreshHook = (
  tenant: TenantIdentity,
  credentials: CredentialState,
) => Promise<TokenPair>;

function describeToken(token: string | null): string {
  return hasSecret(token) ? redactSecret(token) : "none";
}

export class TokenRefresher {
  private readonly inFlight = new Map<string, Promise<boolean>>();
  private readonly hook: RefreshHook;

  constructor(hook: RefreshHook) {
    this.hook = hook;
  }

  /** True while a refresh for `tenant` is running. */
  isRefreshing(tenant: TenantIdentity): boolean {
    return this.inFlight.has(tenantKey(tenant));
  }

  /**
   * Returns true when credentials were (or are presumed to be) refreshed.
   * The holder returns false if its own refresh failed; waiters always
   * return true once the holder settles.
   */
  async refresh(
    tenant: TenantIdentity,
    credentials: CredentialState,
  ): Promise<boolean> {
    const key = tenantKey(tenant);
    const pending = this.inFlight.get(key);
    if (pending) {
      await pending;
      return true;
    }

    const run = this.runHook(tenant, credentials).finally(() => {
      this.inFlight.delete(key);
    });
    this.inFlight.set(key, run);
    return run;
  }

  private async runHook(
    tenant: TenantIdentity,
    credentials: CredentialState,
  ): Promise<boolean> {
    const stale = describeToken(credentials.snapshot().refreshToken);
    try {
      const next = await this.hook(tenant, credentials);
      credentials.update(next);
      logger.info(
        `[token-refresher] Refreshed credentials for ${tenant.domain} (refresh token ${describeToken(credentials.snapshot().refreshToken)})`,
      );
      return true;
    } catch (err) {
      logger.warn(
        `[token-refresher] Refresh failed for ${tenant.domain} (refresh token ${stale}): ${describeError(err)}`,
      );
      return false;
    }
  }
}

export interface OAuthServerOptions {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  timeoutMs?: number;
}

/** Refresh hook speaking the refresh-token grant against the identity provider. */
export function refreshViaOAuthServer(options: OAuthServerOptions): RefreshHook {
  return async (_tenant, credentials) => {
    const { refreshToken } = credentials.snapshot();
    if (!hasSecret(refreshToken)) {
      throw new ApiError("refresh token missing", {
        code: "MISSING_REFRESH_TOKEN",
      });
    }
    if (!hasSecret(options.clientId) || !hasSecret(options.clientSecret)) {
      throw new ApiError("client id and client secret are required for refresh", {
        code: "MISSING_CLIENT_CREDENTIALS",
      });
    }

    const query = new URLSearchParams({
      grant_type: "refresh_token",
      client_id: options.clientId,
      client_secret: options.clientSecret,
      refresh_token: refreshToken,
    });
    const resp = await fetch(`${options.tokenUrl}?${query.toString()}`, {
      method: "GET",
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(options.timeoutMs ?? 30_000),
    });
    const record: unknown = await resp.json().catch(() => null);
    if (!isRecord(record)) {
      throw new ApiError("refresh endpoint returned a non-object body", {
        status: resp.status,
        code: "INVALID_REFRESH_RESPONSE",
      });
    }

    if (typeof record.error === "string") {
      const description = record.error_description;
      throw new ApiError(
        typeof description === "string" ? description : record.error,
        { status: resp.status, code: record.error, payload: record },
      );
    }

    const accessToken = record.access_token;
    if (typeof accessToken !== "string" || !accessToken) {
      throw new ApiError("refresh returned no access_token", {
        status: resp.status,
        code: "INVALID_REFRESH_RESPONSE",
      });
    }
    const nextRefresh = record.refresh_token;
    return {
      accessToken,
      refreshToken: typeof nextRefresh === "string" ? nextRefresh : null,
    };
  };
}
