import type { TokenPair } from "./types.js";

export interface CredentialSnapshot {
  accessToken: string | null;
  refreshToken: string | null;
}

/**
 * Mutable oauth token pair shared by every concurrent call of one tenant.
 *
 * Reads and writes are synchronous, so a snapshot never observes a half
 * written pair. Only the refresh routine should call `update`.
 */
export class CredentialState {
  private accessToken: string | null;
  private refreshToken: string | null;

  constructor(initial: Partial<CredentialSnapshot> = {}) {
    this.accessToken = initial.accessToken ?? null;
    this.refreshToken = initial.refreshToken ?? null;
  }

  snapshot(): CredentialSnapshot {
    return { accessToken: this.accessToken, refreshToken: this.refreshToken };
  }

  /** A missing refresh token in `next` keeps the stored one. */
  update(next: TokenPair): void {
    this.accessToken = next.accessToken;
    if (next.refreshToken != null) {
      this.refreshToken = next.refreshToken;
    }
  }
}
