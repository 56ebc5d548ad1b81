import fs from "node:fs";
import path from "node:path";
import { SyncError, describeError, isSyncError } from "./errors.js";
import { isMissingFile, isRecord } from "./guards.js";

const TOKEN_FILE = "tokens.json";
const DAY_MS = 24 * 60 * 60 * 1000;

export interface TokenRecord {
  username: string;
  token: string;
  issuedAt: Date;
}

interface StoredToken {
  token: string;
  /** Epoch seconds. */
  timestamp: number;
}

export type InvalidateResult = "removed" | "not-found" | "cleared";

export interface TokenCacheOptions {
  dir: string;
  ttlDays: number;
  now?: () => number;
}

/**
 * File-backed map of username → bearer token. Expired entries are hidden from
 * readers but stay on disk until the user is logged out or re-authenticates.
 */
export class TokenCache {
  readonly filePath: string;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor({ dir, ttlDays, now = Date.now }: TokenCacheOptions) {
    this.filePath = path.join(dir, TOKEN_FILE);
    this.ttlMs = ttlDays * DAY_MS;
    this.now = now;
  }

  load(): Record<string, TokenRecord> {
    const fresh: Array<[string, TokenRecord]> = [];
    for (const [username, stored] of this.readStore()) {
      const record = toRecord(username, stored);
      if (this.isFresh(record)) {
        fresh.push([username, record]);
      }
    }
    return Object.fromEntries(fresh);
  }

  get(username: string): TokenRecord | null {
    const stored = this.readStore().get(username);
    if (!stored) return null;
    const record = toRecord(username, stored);
    return this.isFresh(record) ? record : null;
  }

  isFresh(record: TokenRecord): boolean {
    return this.now() - record.issuedAt.getTime() < this.ttlMs;
  }

  save(username: string, token: string): boolean {
    const store = this.readStore();
    store.set(username, { token, timestamp: this.now() / 1000 });
    try {
      this.writeStore(store);
    } catch (err) {
      console.error(`⚠️  Could not save token for ${username}: ${describeError(err)}`);
      return false;
    }
    console.log(`🔑 Token saved for ${username}`);
    return true;
  }

  invalidate(username?: string | null): InvalidateResult {
    if (username == null) {
      fs.rmSync(this.filePath, { force: true });
      console.log("🚪 All tokens invalidated.");
      return "cleared";
    }

    const store = this.readStore();
    if (!store.has(username)) {
      console.log(`ℹ️  No token found for ${username}.`);
      return "not-found";
    }

    store.delete(username);
    this.writeStore(store);
    console.log(`🚪 Token for ${username} invalidated.`);
    return "removed";
  }

  /** Unreadable stores count as empty; the file is left for the next save to replace. */
  private readStore(): Map<string, StoredToken> {
    try {
      return this.parseStore();
    } catch (err) {
      if (!isSyncError(err, "CACHE_READ_ERROR")) throw err;
      console.warn(`⚠️  ${err.message}`);
      return new Map();
    }
  }

  private parseStore(): Map<string, StoredToken> {
    let raw: string;
    try {
      raw = fs.readFileSync(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return new Map();
      throw new SyncError("CACHE_READ_ERROR", `Ignoring unreadable token cache ${this.filePath}: ${describeError(err)}`, {
        cause: err
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      throw new SyncError("CACHE_READ_ERROR", `Ignoring unreadable token cache ${this.filePath}: ${describeError(err)}`, {
        cause: err
      });
    }
    if (!isRecord(parsed)) {
      throw new SyncError("CACHE_READ_ERROR", `Ignoring malformed token cache ${this.filePath}`);
    }

    const store = new Map<string, StoredToken>();
    for (const [username, value] of Object.entries(parsed)) {
      if (isStoredToken(value)) {
        store.set(username, { token: value.token, timestamp: value.timestamp });
      }
    }
    return store;
  }

  private writeStore(store: Map<string, StoredToken>): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    const tempPath = `${this.filePath}.${process.pid}.tmp`;
    try {
      fs.writeFileSync(tempPath, JSON.stringify(Object.fromEntries(store), null, 2));
      fs.renameSync(tempPath, this.filePath);
    } catch (err) {
      fs.rmSync(tempPath, { force: true });
      throw err;
    }
  }
}

function toRecord(username: string, stored: StoredToken): TokenRecord {
  return { username, token: stored.token, issuedAt: new Date(stored.timestamp * 1000) };
}

function isStoredToken(value: unknown): value is StoredToken {
  if (!isRecord(value)) return false;
  return (
    typeof value.token === "string" &&
    value.token.length > 0 &&
    typeof value.timestamp === "number" &&
    Number.isFinite(value.timestamp)
  );
}
