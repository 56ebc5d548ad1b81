export type BallType = "PREMIUM" | "RANGE";
export type BallTypePolicy = BallType | "BOTH";

export const BALL_TYPES: readonly BallType[] = ["PREMIUM", "RANGE"];

export const RANGE_PRACTICE = "RANGE_PRACTICE";

export interface Activity {
  id: string;
  time: string;
  kind: string;
  isHidden: boolean;
}

export interface SessionKey {
  /** Calendar day as yyyyMMdd. */
  date: string;
  sessionNumber: number;
}

export interface Shot {
  time: string | null;
  club: string | null;
  bayName: string | null;
  measurement: Record<string, unknown>;
}

export interface TaggedShot extends Shot {
  session: SessionKey;
  activityId: string;
  activityKind: string;
  activityTime: string;
}

export interface ShotSet {
  activityId: string;
  kind: string | null;
  time: string | null;
  shots: Shot[];
}

export function ballTypesFor(policy: BallTypePolicy): BallType[] {
  return policy === "BOTH" ? [...BALL_TYPES] : [policy];
}

export function parseBallTypePolicy(raw: string): BallTypePolicy | null {
  const upper = raw.trim().toUpperCase();
  if (upper === "PREMIUM" || upper === "PRO") return "PREMIUM";
  if (upper === "RANGE") return "RANGE";
  if (upper === "BOTH") return "BOTH";
  return null;
}
