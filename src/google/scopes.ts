import type { GoogleScope } from "./types.js";

const SCOPE_URL_PREFIX = "https://www.googleapis.com/auth/";

// Broader Google scopes grant everything their narrower siblings do.
const IMPLIED_SCOPES: Record<GoogleScope, GoogleScope[]> = {
  "gmail.readonly": [],
  "gmail.modify": ["gmail.readonly", "gmail.send"],
  "gmail.send": [],
  calendar: ["calendar.events"],
  "calendar.events": [],
};

export function isGoogleScope(value: string): value is GoogleScope {
  return Object.hasOwn(IMPLIED_SCOPES, value);
}

export function scopeSatisfies(
  granted: readonly GoogleScope[],
  required: GoogleScope,
): boolean {
  return granted.some(
    (scope) => scope === required || IMPLIED_SCOPES[scope].includes(required),
  );
}

export function toScopeUrl(scope: GoogleScope): string {
  return `${SCOPE_URL_PREFIX}${scope}`;
}

/**
 * Parse a space- or comma-separated scope list, accepting short names or full
 * googleapis.com URLs. Unknown scopes (openid, userinfo.*) are dropped.
 */
export function parseScopeList(raw: string): GoogleScope[] {
  const scopes = new Set<GoogleScope>();
  for (const part of raw.split(/[\s,]+/)) {
    const name = part.startsWith(SCOPE_URL_PREFIX)
      ? part.slice(SCOPE_URL_PREFIX.length)
      : part;
    if (isGoogleScope(name)) scopes.add(name);
  }
  return [...scopes];
}
