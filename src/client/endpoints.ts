import { validationError } from "./errors.js";
import type { TenantIdentity } from "./types.js";

function normalizeBase(domain: string): string {
  const trimmed = domain.trim().replace(/\/+$/, "");
  if (trimmed.startsWith("http://") || trimmed.startsWith("https://")) {
    return trimmed;
  }
  return `https://${trimmed}`;
}

/**
 * Webhook calls embed the user id and code in the path (v3 shares the v2
 * shape there); oauth calls use `/rest/` or the `/rest/api/` v3 prefix.
 */
export function buildMethodUrl(
  tenant: TenantIdentity,
  method: string,
  restV3 = false,
): string {
  const base = normalizeBase(tenant.domain);
  if (tenant.authMode === "webhook") {
    if (!tenant.webhookUserId || !tenant.webhookCode) {
      throw validationError(
        "MISSING_WEBHOOK_CREDENTIALS",
        "webhookUserId and webhookCode are required for webhook mode",
      );
    }
    return `${base}/rest/${tenant.webhookUserId}/${tenant.webhookCode}/${method}`;
  }
  return restV3 ? `${base}/rest/api/${method}` : `${base}/rest/${method}`;
}
