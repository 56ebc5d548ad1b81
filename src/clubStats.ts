import { promises as fsPromises } from "node:fs";
import { SyncError, describeError } from "./errors.js";
import { parseCsv } from "./exportWriter.js";
import type { SavedSession, SessionInventory } from "./inventory.js";
import { sessionKeyId } from "./sessionKeys.js";
import { roundTo } from "./shots.js";
import type { BallType, SessionKey } from "./types.js";

const { readFile } = fsPromises;

export interface SavedShot {
  key: SessionKey;
  ballType: BallType;
  club: string;
  carry: number | null;
  total: number | null;
}

export interface ClubSummary {
  club: string;
  shots: number;
  sessions: number;
  meanCarry: number | null;
  meanTotal: number | null;
}

export interface ClubReport {
  clubs: ClubSummary[];
  shots: number;
  sessions: number;
}

export interface ClubSessionSummary {
  key: SessionKey;
  shots: number;
  meanCarry: number | null;
  meanTotal: number | null;
}

/**
 * Reads every saved export of the given ball types back into shots. Files
 * that cannot be read or parsed are reported and left out.
 */
export async function loadSavedShots(
  inventory: Pick<SessionInventory, "listSessions">,
  username: string | null | undefined,
  ballTypes: readonly BallType[]
): Promise<SavedShot[]> {
  const shots: SavedShot[] = [];
  for (const saved of inventory.listSessions(username)) {
    if (!ballTypes.includes(saved.ballType)) continue;
    try {
      shots.push(...(await readSavedShots(saved)));
    } catch (err) {
      console.warn(`⚠️  Skipping ${saved.path}: ${describeError(err)}`);
    }
  }
  return shots;
}

export async function readSavedShots(saved: SavedSession): Promise<SavedShot[]> {
  const [header, ...rows] = parseCsv(await readFile(saved.path, "utf8"));
  const clubAt = header ? header.indexOf("Club") : -1;
  if (!header || clubAt < 0) {
    throw new SyncError("MALFORMED_ARTIFACT", "No Club column in the header");
  }
  const carryAt = header.indexOf("carry");
  const totalAt = header.indexOf("total");

  const shots: SavedShot[] = [];
  rows.forEach((row, idx) => {
    if (row.length !== header.length) {
      console.warn(`   ⚠ Skipping row ${idx + 1} of ${saved.path}: expected ${header.length} cells, got ${row.length}`);
      return;
    }
    shots.push({
      key: saved.key,
      ballType: saved.ballType,
      club: row[clubAt],
      carry: readNumber(row, carryAt),
      total: readNumber(row, totalAt)
    });
  });
  return shots;
}

/** Per-club shot and session counts with mean carry and total, clubs in alphabetical order. */
export function summarizeClubs(shots: SavedShot[]): ClubReport {
  const byClub = new Map<string, SavedShot[]>();
  for (const shot of shots) {
    const group = byClub.get(shot.club) ?? [];
    group.push(shot);
    byClub.set(shot.club, group);
  }

  const clubs = [...byClub.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([club, group]) => ({
      club,
      shots: group.length,
      sessions: countSessions(group),
      meanCarry: mean(group.map((shot) => shot.carry)),
      meanTotal: mean(group.map((shot) => shot.total))
    }));

  return { clubs, shots: shots.length, sessions: countSessions(shots) };
}

/** One club session by session, in the order the shots were loaded. Club names match case-insensitively. */
export function clubHistory(shots: SavedShot[], club: string): ClubSessionSummary[] {
  const wanted = club.trim().toLowerCase();
  const bySession = new Map<string, SavedShot[]>();
  for (const shot of shots) {
    if (shot.club.toLowerCase() !== wanted) continue;
    const id = sessionKeyId(shot.key);
    const group = bySession.get(id) ?? [];
    group.push(shot);
    bySession.set(id, group);
  }

  return [...bySession.values()].map((group) => ({
    key: group[0].key,
    shots: group.length,
    meanCarry: mean(group.map((shot) => shot.carry)),
    meanTotal: mean(group.map((shot) => shot.total))
  }));
}

function countSessions(shots: SavedShot[]): number {
  return new Set(shots.map((shot) => sessionKeyId(shot.key))).size;
}

function mean(values: Array<number | null>): number | null {
  const present = values.filter((value): value is number => value !== null);
  if (present.length === 0) return null;
  return roundTo(present.reduce((sum, value) => sum + value, 0) / present.length, 1);
}

function readNumber(row: string[], at: number): number | null {
  if (at < 0) return null;
  const cell = row[at].trim();
  if (!cell) return null;
  const value = Number(cell);
  return Number.isFinite(value) ? value : null;
}
