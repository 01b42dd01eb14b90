/**
 * Environment-driven configuration for the bridge.
 */

import os from "node:os";
import path from "node:path";

import { z } from "zod";

import { ConfigError } from "../errors.js";

const intFromEnv = (fallback: number, min: number, max: number) =>
  z.coerce.number().int().min(min).max(max).default(fallback);

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value === "" ? undefined : value))
  .optional();

const EnvSchema = z
  .object({
    IDENTITY_PROVIDER: z.enum(["google", "auth0"]).default("google"),
    GOOGLE_CLIENT_ID: optionalString,
    GOOGLE_CLIENT_SECRET: optionalString,
    AUTH0_DOMAIN: optionalString,
    AUTH0_CLIENT_ID: optionalString,
    AUTH0_CLIENT_SECRET: optionalString,
    AUTH0_GOOGLE_CONNECTION: z.string().default("google-oauth2"),
    PROVIDER_TIMEOUT_MS: intFromEnv(15_000, 100, 120_000),
    REFRESH_TIMEOUT_MS: intFromEnv(10_000, 100, 120_000),
    TOKEN_SAFETY_MARGIN_MS: intFromEnv(60_000, 0, 30 * 60_000),
    TOOL_RESULT_MAX_CHARS: intFromEnv(500, 20, 100_000),
    WORKDAY_START_HOUR: intFromEnv(9, 0, 23),
    WORKDAY_END_HOUR: intFromEnv(18, 1, 24),
    OBSERVABILITY_URL: z.string().url().optional(),
    OBSERVABILITY_API_KEY: optionalString,
    OBSERVABILITY_TIMEOUT_MS: intFromEnv(2_000, 50, 60_000),
    LINKED_ACCOUNTS_PATH: optionalString,
    LOG_LEVEL: z.enum(["error", "warn", "info", "debug"]).default("info"),
  })
  .superRefine((env, ctx) => {
    if (env.IDENTITY_PROVIDER === "google") {
      for (const key of ["GOOGLE_CLIENT_ID", "GOOGLE_CLIENT_SECRET"] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: "required when IDENTITY_PROVIDER is google",
          });
        }
      }
    } else {
      for (const key of [
        "AUTH0_DOMAIN",
        "AUTH0_CLIENT_ID",
        "AUTH0_CLIENT_SECRET",
      ] as const) {
        if (!env[key]) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: [key],
            message: "required when IDENTITY_PROVIDER is auth0",
          });
        }
      }
    }
    if (env.WORKDAY_START_HOUR >= env.WORKDAY_END_HOUR) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["WORKDAY_END_HOUR"],
        message: "must be after WORKDAY_START_HOUR",
      });
    }
  });

export type IdentityProviderConfig =
  | { kind: "google"; clientId: string; clientSecret: string }
  | {
      kind: "auth0";
      domain: string;
      clientId: string;
      clientSecret: string;
      connection: string;
    };

export type BridgeConfig = {
  identity: IdentityProviderConfig;
  timeouts: {
    providerMs: number;
    refreshMs: number;
  };
  tokenSafetyMarginMs: number;
  resultMaxChars: number;
  workday: { startHour: number; endHour: number };
  observability: {
    url?: string;
    apiKey?: string;
    timeoutMs: number;
  };
  linkedAccountsPath: string;
  logLevel: "error" | "warn" | "info" | "debug";
};

export const DEFAULT_LINKED_ACCOUNTS_PATH = path.join(
  os.homedir(),
  ".inbox-bridge",
  "accounts.json",
);

function expandHome(value: string): string {
  if (value === "~") return os.homedir();
  if (value.startsWith("~/")) return path.join(os.homedir(), value.slice(2));
  return value;
}

/** Account store location; needs no identity credentials, so account commands work before setup. */
export function resolveLinkedAccountsPath(env: NodeJS.ProcessEnv = process.env): string {
  const configured = env.LINKED_ACCOUNTS_PATH?.trim();
  return configured ? expandHome(configured) : DEFAULT_LINKED_ACCOUNTS_PATH;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BridgeConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
      ),
    );
  }
  const e = parsed.data;

  // superRefine guarantees the credentials for the selected provider.
  const identity: IdentityProviderConfig =
    e.IDENTITY_PROVIDER === "google"
      ? {
          kind: "google",
          clientId: e.GOOGLE_CLIENT_ID ?? "",
          clientSecret: e.GOOGLE_CLIENT_SECRET ?? "",
        }
      : {
          kind: "auth0",
          domain: e.AUTH0_DOMAIN ?? "",
          clientId: e.AUTH0_CLIENT_ID ?? "",
          clientSecret: e.AUTH0_CLIENT_SECRET ?? "",
          connection: e.AUTH0_GOOGLE_CONNECTION,
        };

  return {
    identity,
    timeouts: {
      providerMs: e.PROVIDER_TIMEOUT_MS,
      refreshMs: e.REFRESH_TIMEOUT_MS,
    },
    tokenSafetyMarginMs: e.TOKEN_SAFETY_MARGIN_MS,
    resultMaxChars: e.TOOL_RESULT_MAX_CHARS,
    workday: { startHour: e.WORKDAY_START_HOUR, endHour: e.WORKDAY_END_HOUR },
    observability: {
      url: e.OBSERVABILITY_URL,
      apiKey: e.OBSERVABILITY_API_KEY,
      timeoutMs: e.OBSERVABILITY_TIMEOUT_MS,
    },
    linkedAccountsPath: resolveLinkedAccountsPath(env),
    logLevel: e.LOG_LEVEL,
  };
}
