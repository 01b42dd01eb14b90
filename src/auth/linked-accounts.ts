/**
 * Storage of the Google accounts linked to user sessions.
 */

import fs from "node:fs";
import path from "node:path";

import { z } from "zod";

import { GOOGLE_SCOPES, type LinkedAccount } from "../google/types.js";

export type LinkedAccountStore = {
  get(sessionId: string): Promise<LinkedAccount | undefined>;
  upsert(account: LinkedAccount): Promise<void>;
  remove(sessionId: string): Promise<boolean>;
  list(): Promise<LinkedAccount[]>;
};

const LinkedAccountSchema = z.object({
  sessionId: z.string().min(1),
  subject: z.string(),
  email: z.string().optional(),
  displayName: z.string().optional(),
  refreshToken: z.string().min(1),
  grantedScopes: z.array(z.enum(GOOGLE_SCOPES)),
  linkedAt: z.number(),
});

const StoreFileSchema = z.object({
  version: z.literal(1),
  accounts: z.record(LinkedAccountSchema),
});

type StoreFile = z.infer<typeof StoreFileSchema>;

let tmpSequence = 0;

export class MemoryLinkedAccountStore implements LinkedAccountStore {
  private readonly accounts = new Map<string, LinkedAccount>();

  constructor(initial: LinkedAccount[] = []) {
    for (const account of initial) this.accounts.set(account.sessionId, account);
  }

  async get(sessionId: string): Promise<LinkedAccount | undefined> {
    return this.accounts.get(sessionId);
  }

  async upsert(account: LinkedAccount): Promise<void> {
    this.accounts.set(account.sessionId, account);
  }

  async remove(sessionId: string): Promise<boolean> {
    return this.accounts.delete(sessionId);
  }

  async list(): Promise<LinkedAccount[]> {
    return [...this.accounts.values()];
  }
}

/**
 * JSON file store. The file holds refresh credentials, so it is written with
 * owner-only permissions.
 */
export class FileLinkedAccountStore implements LinkedAccountStore {
  private writes: Promise<unknown> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  /**
   * Read-modify-write under an in-process queue. `change` returns whether the
   * file needs rewriting.
   */
  private update(change: (store: StoreFile) => boolean): Promise<boolean> {
    const run = this.writes.then(async () => {
      const store = await this.load();
      const changed = change(store);
      if (changed) await this.save(store);
      return changed;
    });
    // The caller sees the failure through `run`; later writes still proceed.
    this.writes = run.catch(() => undefined);
    return run;
  }

  private async load(): Promise<StoreFile> {
    let raw: string;
    try {
      raw = await fs.promises.readFile(this.filePath, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return { version: 1, accounts: {} };
      }
      throw err;
    }
    const parsed = StoreFileSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(
        `Linked account store at ${this.filePath} is corrupt: ${parsed.error.issues[0]?.message ?? "unknown"}`,
      );
    }
    return parsed.data;
  }

  private async save(store: StoreFile): Promise<void> {
    await fs.promises.mkdir(path.dirname(this.filePath), {
      recursive: true,
      mode: 0o700,
    });
    tmpSequence += 1;
    const tmp = `${this.filePath}.${process.pid}.${tmpSequence}.tmp`;
    await fs.promises.writeFile(tmp, `${JSON.stringify(store, null, 2)}\n`, {
      mode: 0o600,
    });
    await fs.promises.rename(tmp, this.filePath);
  }

  async get(sessionId: string): Promise<LinkedAccount | undefined> {
    const store = await this.load();
    return store.accounts[sessionId];
  }

  async upsert(account: LinkedAccount): Promise<void> {
    await this.update((store) => {
      store.accounts[account.sessionId] = account;
      return true;
    });
  }

  remove(sessionId: string): Promise<boolean> {
    return this.update((store) => {
      if (!store.accounts[sessionId]) return false;
      delete store.accounts[sessionId];
      return true;
    });
  }

  async list(): Promise<LinkedAccount[]> {
    const store = await this.load();
    return Object.values(store.accounts);
  }
}
