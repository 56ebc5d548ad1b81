import { promises as fsPromises } from "node:fs";
import path from "node:path";
import { artifactPath } from "./artifacts.js";
import { SyncError, describeError } from "./errors.js";
import { parseActivityTime, sessionKeyId } from "./sessionKeys.js";
import { MEASUREMENT_FIELDS } from "./shots.js";
import type { BallType, SessionKey, Shot, TaggedShot } from "./types.js";

const { mkdir, writeFile, rename, rm } = fsPromises;

export const CSV_HEADER: readonly string[] = ["Shot Number", "Club", "Bay", ...MEASUREMENT_FIELDS];

const UNKNOWN_CLUB = "Unknown";

export interface ExportRequest {
  key: SessionKey;
  ballType: BallType;
  shots: Shot[];
  username?: string | null;
}

export interface ExportResult {
  key: SessionKey;
  ballType: BallType;
  path: string;
  rows: number;
  skipped: number;
}

export interface RenderedCsv {
  text: string;
  rows: number;
  skipped: number;
}

export class ExportWriter {
  constructor(private readonly dataDir: string) {}

  async writeSession({ key, ballType, shots, username }: ExportRequest): Promise<ExportResult> {
    const filePath = artifactPath(this.dataDir, key, ballType, username);
    const rendered = renderCsv(shots);

    await mkdir(path.dirname(filePath), { recursive: true });
    const tempPath = `${filePath}.partial`;
    try {
      await writeFile(tempPath, rendered.text, "utf8");
      await rename(tempPath, filePath);
    } catch (err) {
      await rm(tempPath, { force: true });
      throw err;
    }

    console.log(`💾 Saved ${rendered.rows} shots → ${filePath}`);
    return { key, ballType, path: filePath, rows: rendered.rows, skipped: rendered.skipped };
  }

  /** Writes one file per session key found among the tagged shots. */
  async writeGrouped(shots: TaggedShot[], ballType: BallType, username?: string | null): Promise<ExportResult[]> {
    const groups = new Map<string, { key: SessionKey; shots: TaggedShot[] }>();
    for (const shot of shots) {
      const id = sessionKeyId(shot.session);
      const group = groups.get(id) ?? { key: shot.session, shots: [] };
      group.shots.push(shot);
      groups.set(id, group);
    }

    const results: ExportResult[] = [];
    for (const group of groups.values()) {
      results.push(await this.writeSession({ key: group.key, ballType, shots: group.shots, username }));
    }
    return results;
  }
}

export function renderCsv(shots: Shot[]): RenderedCsv {
  const lines = [CSV_HEADER.map(escapeCsv).join(",")];
  let rows = 0;
  let skipped = 0;

  sortShots(shots).forEach((shot, idx) => {
    try {
      lines.push(buildRow(shot, idx + 1).join(","));
      rows += 1;
    } catch (err) {
      skipped += 1;
      console.warn(`   ⚠ Skipping shot ${idx + 1}: ${describeError(err)}`);
    }
  });

  return { text: `${lines.join("\n")}\n`, rows, skipped };
}

/**
 * Orders shots by their own timestamp. Shots without a usable time follow
 * the timed ones in their original order.
 */
export function sortShots<T extends Shot>(shots: T[]): T[] {
  const keyed = shots.map((shot) => ({
    shot,
    millis: shot.time ? parseActivityTime(shot.time)?.toMillis() ?? null : null
  }));
  keyed.sort((a, b) => {
    if (a.millis === null && b.millis === null) return 0;
    if (a.millis === null) return 1;
    if (b.millis === null) return -1;
    return a.millis - b.millis;
  });
  return keyed.map((entry) => entry.shot);
}

function buildRow(shot: Shot, ordinal: number): string[] {
  const cells = [String(ordinal), shot.club ?? UNKNOWN_CLUB, shot.bayName ?? ""];
  for (const field of MEASUREMENT_FIELDS) {
    cells.push(formatCell(field, shot.measurement[field]));
  }
  return cells.map(escapeCsv);
}

export function formatCell(field: string, value: unknown): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "string") return value;
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : "";
  if (typeof value === "boolean" || typeof value === "bigint") return String(value);
  throw new SyncError("MALFORMED_ARTIFACT", `Unexpected ${Array.isArray(value) ? "array" : typeof value} in '${field}'`);
}

export function escapeCsv(value: string): string {
  return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Splits CSV text back into rows of cells, undoing `escapeCsv`. Blank lines yield no row. */
export function parseCsv(text: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let cell = "";
  let quoted = false;
  let started = false;

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];
    if (quoted) {
      if (ch !== '"') {
        cell += ch;
      } else if (text[i + 1] === '"') {
        cell += '"';
        i += 1;
      } else {
        quoted = false;
      }
      continue;
    }

    if (ch === '"') {
      quoted = true;
      started = true;
    } else if (ch === ",") {
      row.push(cell);
      cell = "";
      started = true;
    } else if (ch === "\n") {
      if (started) {
        row.push(cell);
        rows.push(row);
      }
      row = [];
      cell = "";
      started = false;
    } else if (ch !== "\r") {
      cell += ch;
      started = true;
    }
  }

  if (quoted) {
    throw new SyncError("MALFORMED_ARTIFACT", "Unterminated quoted cell");
  }
  if (started) {
    row.push(cell);
    rows.push(row);
  }
  return rows;
}
