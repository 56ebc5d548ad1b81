import fs from "node:fs";
import path from "node:path";
import { artifactDir, parseArtifactFileName } from "./artifacts.js";
import { describeError } from "./errors.js";
import { isMissingFile } from "./guards.js";
import { sessionKeyId } from "./sessionKeys.js";
import { BALL_TYPES, type BallType, type SessionKey } from "./types.js";

export interface Inventory {
  pro: Set<string>;
  range: Set<string>;
}

export interface SavedSession {
  key: SessionKey;
  ballType: BallType;
  path: string;
}

export function emptyInventory(): Inventory {
  return { pro: new Set(), range: new Set() };
}

export function hasSession(inventory: Inventory, key: SessionKey, ballType: BallType): boolean {
  const set = ballType === "RANGE" ? inventory.range : inventory.pro;
  return set.has(sessionKeyId(key));
}

/** Reads what has already been exported under the data root. */
export class SessionInventory {
  constructor(private readonly dataDir: string) {}

  scan(username?: string | null): Inventory {
    const inventory = emptyInventory();
    for (const saved of this.listSessions(username)) {
      const set = saved.ballType === "RANGE" ? inventory.range : inventory.pro;
      set.add(sessionKeyId(saved.key));
    }
    return inventory;
  }

  listSessions(username?: string | null): SavedSession[] {
    const sessions: SavedSession[] = [];
    for (const ballType of BALL_TYPES) {
      const dir = artifactDir(this.dataDir, ballType, username);
      for (const fileName of readDirSafe(dir)) {
        const parsed = parseArtifactFileName(fileName);
        if (!parsed || parsed.ballType !== ballType) continue;
        sessions.push({ key: parsed.key, ballType, path: path.join(dir, fileName) });
      }
    }

    return sessions.sort(
      (a, b) =>
        a.key.date.localeCompare(b.key.date) ||
        a.key.sessionNumber - b.key.sessionNumber ||
        a.ballType.localeCompare(b.ballType)
    );
  }

  listUsers(): string[] {
    const users: string[] = [];
    for (const entry of readDirSafe(this.dataDir, { withDirectories: true })) {
      if (BALL_TYPES.some((ballType) => artifactDir("", ballType) === entry)) continue;
      users.push(entry);
    }
    return users.sort();
  }
}

function readDirSafe(dir: string, { withDirectories = false }: { withDirectories?: boolean } = {}): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dir, { withFileTypes: true });
  } catch (err) {
    if (isMissingFile(err)) return [];
    console.warn(`⚠️  Could not read ${dir}: ${describeError(err)}`);
    return [];
  }
  return entries.filter((entry) => (withDirectories ? entry.isDirectory() : entry.isFile())).map((entry) => entry.name);
}
