/**
 * Identity providers that turn a linked account's refresh credential into a
 * short-lived Google access token.
 */

import { z } from "zod";

import { formatErrorMessage } from "../errors.js";
import { parseScopeList } from "../google/scopes.js";
import type { GoogleScope, LinkedAccount } from "../google/types.js";

export type RefreshedToken = {
  token: string;
  expiresAt: number; // Unix timestamp (ms)
  /** Scopes reported by the provider; absent means "as granted at link time". */
  scopes?: GoogleScope[];
};

export type IdentityProvider = {
  name: string;
  refresh(account: LinkedAccount, signal: AbortSignal): Promise<RefreshedToken>;
};

export class IdentityProviderError extends Error {
  /** The provider answered and refused; re-authorization is the only remedy. */
  readonly rejected: boolean;

  constructor(message: string, rejected: boolean, cause?: unknown) {
    super(message, { cause });
    this.name = "IdentityProviderError";
    this.rejected = rejected;
  }
}

const GOOGLE_TOKEN_URL = "https://oauth2.googleapis.com/token";

const AUTH0_FEDERATED_GRANT =
  "urn:auth0:params:oauth:grant-type:token-exchange:federated-connection-access-token";
const AUTH0_FEDERATED_TOKEN_TYPE =
  "http://auth0.com/oauth/token-type/federated-connection-access-token";
const REFRESH_TOKEN_TYPE = "urn:ietf:params:oauth:token-type:refresh_token";

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.coerce.number().positive(),
  scope: z.string().optional(),
});

async function postTokenRequest(params: {
  provider: string;
  url: string;
  body: URLSearchParams | string;
  contentType: string;
  signal: AbortSignal;
  now: () => number;
}): Promise<RefreshedToken> {
  let response: Response;
  try {
    response = await fetch(params.url, {
      method: "POST",
      headers: { "Content-Type": params.contentType },
      body: params.body,
      signal: params.signal,
    });
  } catch (err) {
    throw new IdentityProviderError(
      `${params.provider} token request failed: ${formatErrorMessage(err)}`,
      false,
      err,
    );
  }

  if (!response.ok) {
    const errorText = await response.text().catch(() => "");
    // 400/401/403 carry invalid_grant and friends; anything else is transient.
    const rejected =
      response.status >= 400 &&
      response.status < 500 &&
      response.status !== 429;
    throw new IdentityProviderError(
      `${params.provider} token refresh failed (HTTP ${response.status})${errorText ? `: ${errorText.slice(0, 200)}` : ""}`,
      rejected,
    );
  }

  const parsed = TokenResponseSchema.safeParse(await response.json().catch(() => null));
  if (!parsed.success) {
    throw new IdentityProviderError(
      `${params.provider} returned a malformed token response`,
      false,
    );
  }

  return {
    token: parsed.data.access_token,
    expiresAt: params.now() + parsed.data.expires_in * 1000,
    scopes:
      parsed.data.scope !== undefined ? parseScopeList(parsed.data.scope) : undefined,
  };
}

/**
 * Refresh directly against Google's OAuth token endpoint.
 */
export function createGoogleOAuthProvider(options: {
  clientId: string;
  clientSecret: string;
  tokenUrl?: string;
  now?: () => number;
}): IdentityProvider {
  return {
    name: "google",
    refresh(account, signal) {
      return postTokenRequest({
        provider: "google",
        url: options.tokenUrl ?? GOOGLE_TOKEN_URL,
        contentType: "application/x-www-form-urlencoded",
        body: new URLSearchParams({
          client_id: options.clientId,
          client_secret: options.clientSecret,
          refresh_token: account.refreshToken,
          grant_type: "refresh_token",
        }),
        signal,
        now: options.now ?? Date.now,
      });
    },
  };
}

/**
 * Exchange an Auth0 refresh token for the Google access token held in the
 * Auth0 Token Vault for the linked connection.
 */
export function createAuth0TokenVaultProvider(options: {
  domain: string;
  clientId: string;
  clientSecret: string;
  connection: string;
  now?: () => number;
}): IdentityProvider {
  const domain = options.domain.replace(/^https?:\/\//, "").replace(/\/+$/, "");
  return {
    name: "auth0",
    refresh(account, signal) {
      return postTokenRequest({
        provider: "auth0",
        url: `https://${domain}/oauth/token`,
        contentType: "application/json",
        body: JSON.stringify({
          client_id: options.clientId,
          client_secret: options.clientSecret,
          grant_type: AUTH0_FEDERATED_GRANT,
          subject_token: account.refreshToken,
          subject_token_type: REFRESH_TOKEN_TYPE,
          requested_token_type: AUTH0_FEDERATED_TOKEN_TYPE,
          connection: options.connection,
        }),
        signal,
        now: options.now ?? Date.now,
      });
    },
  };
}
