/**
 * Resolves a session to a Google access token that is unexpired and carries
 * the requested scope, refreshing through the identity provider when needed.
 */

import { CredentialError, TimeoutError, formatErrorMessage } from "../errors.js";
import { scopeSatisfies } from "../google/scopes.js";
import type { AccessToken, GoogleScope, LinkedAccount } from "../google/types.js";
import { createSubsystemLogger, type SubsystemLogger } from "../logging.js";
import { withTimeout } from "../utils/timeout.js";
import { type IdentityProvider, IdentityProviderError } from "./identity-provider.js";
import type { LinkedAccountStore } from "./linked-accounts.js";

function missingScope(
  granted: readonly GoogleScope[],
  required: readonly GoogleScope[],
): GoogleScope | undefined {
  return required.find((scope) => !scopeSatisfies(granted, scope));
}

/** Process-wide token cache keyed by session id; pass one per scenario in tests. */
export class TokenCache {
  private readonly tokens = new Map<string, AccessToken>();

  get(sessionId: string): AccessToken | undefined {
    return this.tokens.get(sessionId);
  }

  set(token: AccessToken): void {
    this.tokens.set(token.sessionId, token);
  }

  delete(sessionId: string): boolean {
    return this.tokens.delete(sessionId);
  }

  clear(): void {
    this.tokens.clear();
  }

  get size(): number {
    return this.tokens.size;
  }
}

export type CredentialResolverOptions = {
  accounts: LinkedAccountStore;
  identityProvider: IdentityProvider;
  cache?: TokenCache;
  safetyMarginMs: number;
  refreshTimeoutMs: number;
  now?: () => number;
  logger?: SubsystemLogger;
};

export class CredentialResolver {
  private readonly accounts: LinkedAccountStore;
  private readonly identityProvider: IdentityProvider;
  private readonly cache: TokenCache;
  private readonly safetyMarginMs: number;
  private readonly refreshTimeoutMs: number;
  private readonly now: () => number;
  private readonly log: SubsystemLogger;
  private readonly inflight = new Map<string, Promise<AccessToken>>();

  constructor(options: CredentialResolverOptions) {
    this.accounts = options.accounts;
    this.identityProvider = options.identityProvider;
    this.cache = options.cache ?? new TokenCache();
    this.safetyMarginMs = options.safetyMarginMs;
    this.refreshTimeoutMs = options.refreshTimeoutMs;
    this.now = options.now ?? Date.now;
    this.log = options.logger ?? createSubsystemLogger("credentials");
  }

  /** Every scope in `required` must be covered by the returned token. */
  async resolve(
    sessionId: string,
    required: GoogleScope | readonly GoogleScope[],
  ): Promise<AccessToken> {
    const requiredScopes = typeof required === "string" ? [required] : required;
    const cached = this.usableToken(sessionId, requiredScopes);
    if (cached) return cached;

    const account = await this.accounts.get(sessionId);
    if (!account) {
      throw new CredentialError(
        "NoLinkedAccount",
        sessionId,
        "No Google account is linked to this session",
      );
    }
    const notGranted = missingScope(account.grantedScopes, requiredScopes);
    if (notGranted) {
      throw new CredentialError(
        "InsufficientScope",
        sessionId,
        `Linked Google account has not granted ${notGranted}`,
      );
    }

    // Another caller may have finished a refresh while we read the store.
    const refreshedMeanwhile = this.usableToken(sessionId, requiredScopes);
    if (refreshedMeanwhile) return refreshedMeanwhile;

    const token = await this.refreshOnce(account);
    const notCarried = missingScope(token.scopes, requiredScopes);
    if (notCarried) {
      throw new CredentialError(
        "InsufficientScope",
        sessionId,
        `Refreshed Google token does not carry ${notCarried}`,
      );
    }
    return token;
  }

  /** Drop the cached token, e.g. after Google rejected it mid-call. */
  invalidate(sessionId: string): void {
    if (this.cache.delete(sessionId)) {
      this.log.info("Invalidated cached Google token", { sessionId });
    }
  }

  private usableToken(
    sessionId: string,
    requiredScopes: readonly GoogleScope[],
  ): AccessToken | undefined {
    const token = this.cache.get(sessionId);
    if (!token) return undefined;
    if (token.expiresAt <= this.now() + this.safetyMarginMs) return undefined;
    if (missingScope(token.scopes, requiredScopes)) return undefined;
    return token;
  }

  private refreshOnce(account: LinkedAccount): Promise<AccessToken> {
    const existing = this.inflight.get(account.sessionId);
    if (existing) return existing;

    const pending = this.refresh(account).finally(() => {
      this.inflight.delete(account.sessionId);
    });
    this.inflight.set(account.sessionId, pending);
    return pending;
  }

  private async refresh(account: LinkedAccount): Promise<AccessToken> {
    const { sessionId } = account;
    const controller = new AbortController();
    const startedAt = this.now();
    this.log.info("Refreshing Google token", {
      sessionId,
      provider: this.identityProvider.name,
    });

    try {
      const refreshed = await withTimeout(
        this.identityProvider.refresh(account, controller.signal),
        this.refreshTimeoutMs,
        "token refresh",
      );
      const token: AccessToken = {
        token: refreshed.token,
        scopes: refreshed.scopes ?? account.grantedScopes,
        expiresAt: refreshed.expiresAt,
        sessionId,
      };
      this.cache.set(token);
      this.log.debug("Google token refreshed", {
        sessionId,
        durationMs: this.now() - startedAt,
        expiresAt: new Date(token.expiresAt).toISOString(),
      });
      return token;
    } catch (err) {
      if (err instanceof TimeoutError) controller.abort();
      this.cache.delete(sessionId);
      this.log.warn("Google token refresh failed", {
        sessionId,
        error: formatErrorMessage(err),
      });
      if (err instanceof IdentityProviderError && err.rejected) {
        throw new CredentialError("RefreshFailed", sessionId, err.message);
      }
      throw new CredentialError(
        "Unavailable",
        sessionId,
        `Could not refresh Google access: ${formatErrorMessage(err)}`,
      );
    }
  }
}
