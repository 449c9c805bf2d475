/**
 * Tenant and wire types for the portal REST API.
 */

export type AuthMode = "webhook" | "oauth";

export interface TenantIdentity {
  readonly domain: string;
  readonly authMode: AuthMode;
  readonly webhookUserId?: string;
  readonly webhookCode?: string;
}

export type CallParams = Record<string, unknown>;

/** Decoded success body; `result` holds the method payload. */
export type ApiResponse = Record<string, unknown>;

export interface CallOptions {
  /** Use the `/rest/api/` path variant (oauth mode only). */
  restV3?: boolean;
}

export interface TokenPair {
  accessToken: string;
  refreshToken?: string | null;
}

export function createTenantIdentity(input: TenantIdentity): TenantIdentity {
  return Object.freeze({ ...input });
}

/** Rate limiter and refresh coordination key for a tenant. */
export function tenantKey(tenant: TenantIdentity): string {
  return tenant.domain;
}
