/**
 * CLI commands for linking Google accounts to agent sessions.
 */

import type { Command } from "commander";

import { formatErrorMessage } from "../errors.js";
import { danger, info, success } from "../globals.js";
import { parseScopeList } from "../google/scopes.js";
import type { CliDeps } from "./deps.js";

const DEFAULT_SCOPES = "gmail.modify calendar";

type LinkOptions = {
  session: string;
  refreshToken: string;
  scopes: string;
  email?: string;
  subject?: string;
};

export function registerAccountsCli(program: Command, deps: CliDeps) {
  const { runtime } = deps;
  const accounts = program
    .command("accounts")
    .description("Link Google accounts to agent sessions");

  accounts
    .command("link")
    .description("Store a Google refresh credential for a session")
    .requiredOption("--session <id>", "Agent session id")
    .requiredOption("--refresh-token <token>", "Refresh token issued at consent time")
    .option("--scopes <list>", "Granted scopes, space or comma separated", DEFAULT_SCOPES)
    .option("--email <address>", "Google account email, for display")
    .option("--subject <id>", "Identity provider subject (default: the session id)")
    .action(async (opts: LinkOptions) => {
      try {
        const grantedScopes = parseScopeList(opts.scopes);
        if (grantedScopes.length === 0) {
          runtime.error(danger(`No known Google scopes in: ${opts.scopes}`));
          runtime.exit(1);
          return;
        }

        await deps.openAccounts().upsert({
          sessionId: opts.session,
          subject: opts.subject ?? opts.session,
          email: opts.email,
          refreshToken: opts.refreshToken,
          grantedScopes,
          linkedAt: deps.now(),
        });
        runtime.log(
          success(`Linked Google account for session ${opts.session}`),
        );
        runtime.log(info(`Scopes: ${grantedScopes.join(", ")}`));
      } catch (err) {
        runtime.error(danger(`Linking failed: ${formatErrorMessage(err)}`));
        runtime.exit(1);
      }
    });

  accounts
    .command("unlink")
    .description("Remove the Google account linked to a session")
    .requiredOption("--session <id>", "Agent session id")
    .action(async (opts: { session: string }) => {
      try {
        const removed = await deps.openAccounts().remove(opts.session);
        runtime.log(
          removed
            ? success(`Unlinked session ${opts.session}`)
            : info(`No linked account for session ${opts.session}`),
        );
      } catch (err) {
        runtime.error(danger(`Unlinking failed: ${formatErrorMessage(err)}`));
        runtime.exit(1);
      }
    });

  accounts
    .command("status")
    .description("Show linked Google accounts")
    .option("--json", "Output JSON", false)
    .action(async (opts: { json: boolean }) => {
      try {
        const linked = await deps.openAccounts().list();
        // Refresh tokens never leave the store.
        const summaries = linked.map((account) => ({
          sessionId: account.sessionId,
          subject: account.subject,
          email: account.email,
          grantedScopes: account.grantedScopes,
          linkedAt: new Date(account.linkedAt).toISOString(),
        }));

        if (opts.json) {
          runtime.log(JSON.stringify({ accounts: summaries }, null, 2));
          return;
        }

        if (summaries.length === 0) {
          runtime.log(info("No Google accounts linked."));
          runtime.log(info("Run: inbox-bridge accounts link --session <id> --refresh-token <token>"));
          return;
        }

        runtime.log(info("Linked Google accounts:\n"));
        for (const account of summaries) {
          runtime.log(`  ${account.email ?? account.subject} [session ${account.sessionId}]`);
          runtime.log(info(`    Scopes: ${account.grantedScopes.join(", ")}`));
          runtime.log(info(`    Linked: ${account.linkedAt}`));
        }
      } catch (err) {
        runtime.error(danger(`Status check failed: ${formatErrorMessage(err)}`));
        runtime.exit(1);
      }
    });
}
