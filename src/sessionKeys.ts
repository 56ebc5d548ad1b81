import { DateTime } from "luxon";
import type { Activity, SessionKey } from "./types.js";

export interface KeyedActivity {
  /** 1-based position in the activity list the keys were assigned from. */
  index: number;
  activity: Activity;
  key: SessionKey;
}

export function sessionKeyId(key: SessionKey): string {
  return `${key.date}#${key.sessionNumber}`;
}

export function formatSessionDate(date: string): string {
  return `${date.slice(0, 4)}-${date.slice(4, 6)}-${date.slice(6, 8)}`;
}

/**
 * Parses an activity time, keeping its own UTC offset unless a zone is
 * given. Returns null when the value is not ISO-8601.
 */
export function parseActivityTime(time: string, timezone?: string | null): DateTime | null {
  let dt = DateTime.fromISO(time.trim(), { setZone: true });
  if (dt.isValid && timezone) {
    dt = dt.setZone(timezone);
  }
  return dt.isValid ? dt : null;
}

/**
 * Buckets activities by calendar day and numbers them 1..n within each day
 * in chronological order. Equal timestamps keep their list order. Activities
 * whose time does not parse get no key.
 */
export function assignSessionKeys(activities: Activity[], timezone?: string | null): KeyedActivity[] {
  type Dated = { index: number; activity: Activity; date: string; millis: number };

  const byDate = new Map<string, Dated[]>();
  activities.forEach((activity, position) => {
    const dt = parseActivityTime(activity.time, timezone);
    if (!dt) {
      console.warn(`⚠️  Skipping activity ${activity.id} with unparseable time '${activity.time}'`);
      return;
    }
    const date = dt.toFormat("yyyyMMdd");
    const bucket = byDate.get(date) ?? [];
    bucket.push({ index: position + 1, activity, date, millis: dt.toMillis() });
    byDate.set(date, bucket);
  });

  const keyed: KeyedActivity[] = [];
  for (const bucket of byDate.values()) {
    const ordered = [...bucket].sort((a, b) => a.millis - b.millis || a.index - b.index);
    ordered.forEach((entry, rank) => {
      keyed.push({
        index: entry.index,
        activity: entry.activity,
        key: { date: entry.date, sessionNumber: rank + 1 }
      });
    });
  }

  return keyed.sort((a, b) => a.index - b.index);
}
