import { isRecord, readString } from "./guards.js";
import type { BallType, Shot, ShotSet } from "./types.js";

export type MeasurementType = "PRO_BALL_MEASUREMENT" | "SITE_MEASUREMENT";

/** Column order of every exported CSV after Shot Number, Club and Bay. */
export const MEASUREMENT_FIELDS = [
  "ballSpeed",
  "ballSpin",
  "carry",
  "carryActual",
  "carrySide",
  "carrySideActual",
  "curve",
  "curveActual",
  "curveTotal",
  "curveTotalActual",
  "launchAngle",
  "launchDirection",
  "maxHeight",
  "spinAxis",
  "total",
  "totalActual",
  "totalSide",
  "totalSideActual",
  "ballSpinEffective",
  "targetDistance",
  "distanceFromPin",
  "distanceFromPinActual",
  "distanceFromPinTotal",
  "distanceFromPinTotalActual",
  "landingAngle",
  "reducedAccuracy"
] as const;

const MS_TO_KMH = 3.6;
const PRECISION = 1;

export function measurementTypeFor(ballType: BallType): MeasurementType {
  return ballType === "RANGE" ? "SITE_MEASUREMENT" : "PRO_BALL_MEASUREMENT";
}

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Converts a raw measurement into its display form: ball speed in km/h,
 * numbers at one decimal, effective spin and reduced accuracy as text.
 */
export function normalizeMeasurement(raw: unknown): Record<string, unknown> {
  const measurement: Record<string, unknown> = isRecord(raw) ? { ...raw } : {};

  for (const [key, value] of Object.entries(measurement)) {
    if (key === "ballSpeed") {
      const speed = toFiniteNumber(value);
      if (speed !== null) measurement[key] = roundTo(speed * MS_TO_KMH, PRECISION);
    } else if (typeof value === "number" && Number.isFinite(value)) {
      measurement[key] = roundTo(value, PRECISION);
    }
  }

  if (measurement.ballSpinEffective == null) {
    measurement.ballSpinEffective = "None";
  }
  measurement.reducedAccuracy = isReducedAccuracy(measurement.reducedAccuracy) ? "Yes" : "No";

  return measurement;
}

export function parseShotSet(activityId: string, node: unknown): ShotSet {
  if (!isRecord(node)) {
    return { activityId, kind: null, time: null, shots: [] };
  }

  const strokes = Array.isArray(node.strokes) ? node.strokes : [];
  const shots: Shot[] = [];
  for (const stroke of strokes) {
    if (!isRecord(stroke)) continue;
    shots.push({
      time: readString(stroke, "time"),
      club: readString(stroke, "club"),
      bayName: readString(stroke, "bayName"),
      measurement: normalizeMeasurement(stroke.measurement)
    });
  }

  return {
    activityId: readString(node, "id") ?? activityId,
    kind: readString(node, "kind"),
    time: readString(node, "time"),
    shots
  };
}

function toFiniteNumber(value: unknown): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim()) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function isReducedAccuracy(value: unknown): boolean {
  if (value === true) return true;
  if (typeof value === "string") return value.trim() !== "" && value !== "No";
  if (Array.isArray(value)) return value.length > 0;
  return false;
}
