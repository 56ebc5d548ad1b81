import type { ApiClient } from "./apiClient.js";
import { SyncError, describeError } from "./errors.js";
import type { ExportResult, ExportWriter } from "./exportWriter.js";
import { hasSession, type Inventory } from "./inventory.js";
import { assignSessionKeys, formatSessionDate, type KeyedActivity } from "./sessionKeys.js";
import {
  RANGE_PRACTICE,
  ballTypesFor,
  type Activity,
  type BallType,
  type BallTypePolicy,
  type Shot,
  type TaggedShot
} from "./types.js";

export interface WorkItem extends KeyedActivity {
  /** Halves to fetch and write for this activity. */
  ballTypes: BallType[];
}

export interface SyncFailure {
  index: number;
  activityId: string;
  ballType: BallType;
  error: unknown;
}

export interface SyncReport {
  written: ExportResult[];
  failures: SyncFailure[];
  emptyHalves: Array<{ index: number; ballType: BallType }>;
}

export interface ReconciliationEngineOptions {
  api: Pick<ApiClient, "fetchShots">;
  writer: Pick<ExportWriter, "writeGrouped">;
  timezone?: string | null;
}

export function filterRangePractice(activities: Activity[]): Activity[] {
  return activities.filter((activity) => activity.kind === RANGE_PRACTICE);
}

/** Keeps the activities whose key is absent from the inventory for at least one requested half. */
export function planMissing(keyed: KeyedActivity[], inventory: Inventory, policy: BallTypePolicy): WorkItem[] {
  const items: WorkItem[] = [];
  for (const entry of keyed) {
    const missing = ballTypesFor(policy).filter((ballType) => !hasSession(inventory, entry.key, ballType));
    if (missing.length > 0) {
      items.push({ ...entry, ballTypes: missing });
    }
  }
  return items.sort((a, b) => a.index - b.index);
}

export function planAll(keyed: KeyedActivity[], policy: BallTypePolicy): WorkItem[] {
  return keyed.map((entry) => ({ ...entry, ballTypes: ballTypesFor(policy) }));
}

export function planSelection(keyed: KeyedActivity[], indices: number[], policy: BallTypePolicy): WorkItem[] {
  const byIndex = new Map(keyed.map((entry) => [entry.index, entry]));
  const items: WorkItem[] = [];
  for (const index of [...new Set(indices)].sort((a, b) => a - b)) {
    const entry = byIndex.get(index);
    if (!entry) {
      throw new SyncError("CONFIG_ERROR", `No range practice activity #${index}.`);
    }
    items.push({ ...entry, ballTypes: ballTypesFor(policy) });
  }
  return items;
}

export function describePlan(items: WorkItem[], label = "missing"): string[] {
  return items.map(
    (item) =>
      `${item.index}. ${item.activity.kind} - ${formatSessionDate(item.key.date)} session ${item.key.sessionNumber} (${label}: ${item.ballTypes.join("/")})`
  );
}

export function tagShot(shot: Shot, entry: KeyedActivity): TaggedShot {
  return {
    ...shot,
    session: entry.key,
    activityId: entry.activity.id,
    activityKind: entry.activity.kind,
    activityTime: entry.activity.time
  };
}

export class ReconciliationEngine {
  constructor(private readonly options: ReconciliationEngineOptions) {}

  keyActivities(activities: Activity[]): KeyedActivity[] {
    return assignSessionKeys(filterRangePractice(activities), this.options.timezone);
  }

  planMissing(activities: Activity[], inventory: Inventory, policy: BallTypePolicy): WorkItem[] {
    return planMissing(this.keyActivities(activities), inventory, policy);
  }

  /**
   * Fetches and writes every half of every item, one request at a time. A
   * failing half is reported and the rest of that activity is skipped.
   */
  async execute(items: WorkItem[], { username }: { username?: string | null } = {}): Promise<SyncReport> {
    const { api, writer } = this.options;
    const report: SyncReport = { written: [], failures: [], emptyHalves: [] };
    const tag = username ? `[${username}] ` : "";

    for (const [position, item] of items.entries()) {
      const label = `${formatSessionDate(item.key.date)} session ${item.key.sessionNumber}`;
      console.log(`📚 ${tag}Processing activity ${position + 1}/${items.length} (#${item.index}, ${label}) …`);

      for (const ballType of item.ballTypes) {
        try {
          const shotSet = await api.fetchShots(item.activity.id, ballType);
          if (shotSet.shots.length === 0) {
            console.log(`   ℹ️  No ${ballType} shots; nothing written.`);
            report.emptyHalves.push({ index: item.index, ballType });
            continue;
          }

          const tagged = shotSet.shots.map((shot) => tagShot(shot, item));
          report.written.push(...(await writer.writeGrouped(tagged, ballType, username)));
        } catch (err) {
          console.error(`   ⚠ Failed ${ballType} for activity #${item.index}: ${describeError(err)}`);
          report.failures.push({ index: item.index, activityId: item.activity.id, ballType, error: err });
          break;
        }
      }
    }

    return report;
  }
}

export type Selection = { mode: "missing" } | { mode: "all" } | { mode: "pick"; indices: number[] };

/** Accepts `missing`, `all`, or a comma separated list of 1-based activity numbers. */
export function parseSelection(raw: string): Selection | null {
  const value = raw.trim().toLowerCase();
  if (value === "missing") return { mode: "missing" };
  if (value === "all") return { mode: "all" };

  const parts = value.split(",").map((part) => part.trim());
  if (parts.length === 0 || parts.some((part) => !/^[1-9]\d*$/.test(part))) return null;
  return { mode: "pick", indices: parts.map(Number) };
}

export function planFor(
  selection: Selection,
  keyed: KeyedActivity[],
  inventory: Inventory,
  policy: BallTypePolicy
): WorkItem[] {
  switch (selection.mode) {
    case "missing":
      return planMissing(keyed, inventory, policy);
    case "all":
      return planAll(keyed, policy);
    case "pick":
      return planSelection(keyed, selection.indices, policy);
  }
}
