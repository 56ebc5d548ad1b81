import path from "node:path";
import { isValid, parse } from "date-fns";
import type { BallType, SessionKey } from "./types.js";

/**
 * Export filenames look like `rangesync-v1_20240501_session2_pro.csv`.
 * Bump the version when the layout changes so old files are not mistaken
 * for current ones.
 */
export const ARTIFACT_SCHEME_VERSION = 1;

const ARTIFACT_PREFIX = `rangesync-v${ARTIFACT_SCHEME_VERSION}`;
const ARTIFACT_PATTERN = /^rangesync-v(\d+)_(\d{8})_session([1-9]\d*)_(pro|range)\.csv$/;

export type ArtifactSuffix = "pro" | "range";

export interface ParsedArtifactName {
  key: SessionKey;
  ballType: BallType;
}

export function suffixFor(ballType: BallType): ArtifactSuffix {
  return ballType === "RANGE" ? "range" : "pro";
}

export function artifactFileName(key: SessionKey, ballType: BallType): string {
  return `${ARTIFACT_PREFIX}_${key.date}_session${key.sessionNumber}_${suffixFor(ballType)}.csv`;
}

export function parseArtifactFileName(fileName: string): ParsedArtifactName | null {
  const match = ARTIFACT_PATTERN.exec(fileName);
  if (!match) return null;

  const [, version, date, session, suffix] = match;
  if (Number(version) !== ARTIFACT_SCHEME_VERSION) return null;
  if (!isValid(parse(date, "yyyyMMdd", new Date()))) return null;

  return {
    key: { date, sessionNumber: Number(session) },
    ballType: suffix === "range" ? "RANGE" : "PREMIUM"
  };
}

export function artifactDir(dataDir: string, ballType: BallType, username?: string | null): string {
  const base = username ? path.join(dataDir, username) : dataDir;
  return path.join(base, suffixFor(ballType));
}

export function artifactPath(
  dataDir: string,
  key: SessionKey,
  ballType: BallType,
  username?: string | null
): string {
  return path.join(artifactDir(dataDir, ballType, username), artifactFileName(key, ballType));
}
