#!/usr/bin/env node
import { Command } from "commander";
import * as readline from "node:readline/promises";
import { format } from "date-fns";
import { clubHistory, loadSavedShots, summarizeClubs } from "./clubStats.js";
import { resolveConfig, type ConfigOptions } from "./config.js";
import { describeError, isSyncError } from "./errors.js";
import { formatSessionDate } from "./sessionKeys.js";
import { describePlan, parseSelection, planFor } from "./reconcile.js";
import { createServices, type Services } from "./services.js";
import { ballTypesFor, parseBallTypePolicy } from "./types.js";

interface CliOptions extends ConfigOptions {
  user?: string;
  all?: boolean;
  ballType?: string;
  select?: string;
  dryRun?: boolean;
  yes?: boolean;
  club?: string;
}

const program = new Command();
program
  .name("rangesync")
  .description("Range practice session sync CLI")
  .version("0.1.0")
  .option("--home <dir>", "directory holding tokens/ and data/ (env RANGESYNC_HOME)")
  .option("--token-ttl-days <days>", "how long a saved token is trusted (env RANGESYNC_TOKEN_TTL_DAYS)")
  .option("--tz <zone>", "IANA zone used to bucket sessions by day (env RANGESYNC_TZ)")
  .option("--headed", "always show the login browser window");

program
  .command("login")
  .description("Reuse a saved token or log in through the browser and save the token")
  .option("--user <name>", "username/email to reuse or save the token under (env RANGESYNC_USER)")
  .action(async (_opts: unknown, command: Command) => {
    const opts = command.optsWithGlobals<CliOptions>();
    const services = setup(opts);
    const result = await login(services, opts);
    console.log(`✅ Logged in${result.username ? ` as ${result.username}` : ""} (${result.source}).`);
  });

program
  .command("logout [username]")
  .description("Forget the saved token of one user, or of everyone with --all")
  .option("--all", "remove every saved token")
  .action(async (username: string | undefined, _opts: unknown, command: Command) => {
    const opts = command.optsWithGlobals<CliOptions>();
    if (!username && !opts.all) {
      console.error("Name a user to log out, or pass --all.");
      process.exit(2);
    }
    const { cache } = setup(opts);
    const outcome = cache.invalidate(opts.all ? null : username);
    if (outcome === "not-found") {
      process.exitCode = 1;
    }
  });

program
  .command("users")
  .description("List users with a saved token and users with saved sessions")
  .action(async (_opts: unknown, command: Command) => {
    const { cache, inventory } = setup(command.optsWithGlobals<CliOptions>());

    const tokens = Object.values(cache.load());
    console.log(tokens.length ? "🔑 Saved tokens:" : "🔑 No saved tokens.");
    for (const record of tokens) {
      console.log(`   ${record.username} (saved ${format(record.issuedAt, "yyyy-MM-dd HH:mm")})`);
    }

    const users = inventory.listUsers();
    console.log(users.length ? "📁 Users with saved sessions:" : "📁 No saved sessions.");
    for (const user of users) {
      console.log(`   ${user}`);
    }
  });

program
  .command("sessions")
  .description("List the session files already saved")
  .option("--user <name>", "data namespace to inspect (env RANGESYNC_USER)")
  .action(async (_opts: unknown, command: Command) => {
    const opts = command.optsWithGlobals<CliOptions>();
    const { inventory } = setup(opts);
    const saved = inventory.listSessions(resolveUser(opts));
    if (saved.length === 0) {
      console.log("ℹ️  No saved sessions.");
      return;
    }
    for (const entry of saved) {
      console.log(
        `   ${formatSessionDate(entry.key.date)} session ${entry.key.sessionNumber} [${entry.ballType}] → ${entry.path}`
      );
    }
  });

program
  .command("clubs")
  .description("Summarize saved shots per club, or one club session by session")
  .option("--user <name>", "data namespace to read (env RANGESYNC_USER)")
  .option("--ball-type <type>", "premium, range or both", "both")
  .option("--club <name>", "show one club over time")
  .action(async (_opts: unknown, command: Command) => {
    const opts = command.optsWithGlobals<CliOptions>();
    const policy = parseBallTypePolicy(opts.ballType ?? "both");
    if (!policy) {
      console.error("--ball-type must be premium, range or both.");
      process.exit(2);
    }

    const { inventory } = setup(opts);
    const shots = await loadSavedShots(inventory, resolveUser(opts), ballTypesFor(policy));
    if (shots.length === 0) {
      console.log("ℹ️  No saved shots.");
      return;
    }

    if (opts.club) {
      const history = clubHistory(shots, opts.club);
      if (history.length === 0) {
        console.log(`ℹ️  No saved shots for ${opts.club}.`);
        return;
      }
      console.log(`\n📈 ${opts.club} over ${history.length} session(s):`);
      for (const entry of history) {
        console.log(
          `   ${formatSessionDate(entry.key.date)} session ${entry.key.sessionNumber}: ${entry.shots} shots; ${describeMeans(entry)}`
        );
      }
      return;
    }

    const report = summarizeClubs(shots);
    console.log(`\n⛳ ${report.shots} shots across ${report.sessions} sessions:`);
    report.clubs.forEach((club, idx) => {
      console.log(`${idx + 1}: ${club.club} (${club.shots} shots across ${club.sessions} sessions; ${describeMeans(club)})`);
    });
  });

program
  .command("activities")
  .description("List range practice activities with their session numbers")
  .option("--user <name>", "username/email whose saved token to use (env RANGESYNC_USER)")
  .action(async (_opts: unknown, command: Command) => {
    const opts = command.optsWithGlobals<CliOptions>();
    const services = setup(opts);
    await login(services, opts);

    const keyed = services.engine.keyActivities(await fetchActivitiesOrExit(services));
    console.log(`\nRange practice activities (${keyed.length}):`);
    for (const entry of keyed) {
      const hidden = entry.activity.isHidden ? " [hidden]" : "";
      console.log(
        `${entry.index}. ${entry.activity.kind} - ${formatSessionDate(entry.key.date)} (Session #${entry.key.sessionNumber})${hidden}`
      );
    }
  });

program
  .command("sync")
  .description("Download shot data for missing, all, or selected activities")
  .option("--user <name>", "username/email whose saved token to use (env RANGESYNC_USER)")
  .option("--ball-type <type>", "premium, range or both", "both")
  .option("--select <which>", "missing, all, or activity numbers such as 1,4", "missing")
  .option("--dry-run", "only list what would be downloaded")
  .option("--yes", "download without asking for confirmation")
  .action(async (_opts: unknown, command: Command) => {
    const opts = command.optsWithGlobals<CliOptions>();

    const policy = parseBallTypePolicy(opts.ballType ?? "both");
    if (!policy) {
      console.error("--ball-type must be premium, range or both.");
      process.exit(2);
    }
    const selection = parseSelection(opts.select ?? "missing");
    if (!selection) {
      console.error("--select must be missing, all, or a list of activity numbers.");
      process.exit(2);
    }

    const services = setup(opts);
    const auth = await login(services, opts);
    const username = auth.username;

    const keyed = services.engine.keyActivities(await fetchActivitiesOrExit(services));
    if (keyed.length === 0) {
      console.log("ℹ️  No range practice activities found.");
      return;
    }

    const items = guard(() => planFor(selection, keyed, services.inventory.scan(username), policy));
    if (items.length === 0) {
      console.log("✅ All sessions are already saved. No missing sessions found.");
      return;
    }

    const label = selection.mode === "missing" ? "missing" : "fetch";
    console.log(`\n🎯 ${items.length} session(s) to download:`);
    for (const line of describePlan(items, label)) {
      console.log(`  - ${line}`);
    }

    if (opts.dryRun) return;
    if (!opts.yes && !(await confirm(`\nDownload and save ${items.length} session(s)?`))) {
      console.log("Nothing downloaded.");
      return;
    }

    const report = await services.engine.execute(items, { username });
    console.log(
      `\n📄 Wrote ${report.written.length} file(s); ${report.failures.length} failure(s); ${report.emptyHalves.length} empty half/halves.`
    );
    if (report.failures.length > 0) {
      process.exitCode = 5;
    }
  });

await program.parseAsync(process.argv);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function setup(opts: CliOptions): Services {
  return createServices(guard(() => resolveConfig(opts)));
}

function resolveUser(opts: CliOptions): string | null {
  const user = opts.user?.trim() || process.env.RANGESYNC_USER?.trim();
  return user || null;
}

async function login(services: Services, opts: CliOptions) {
  const username = resolveUser(opts);
  const password = process.env.RANGESYNC_PASS;
  try {
    return await services.api.authenticate({ username, password });
  } catch (err) {
    console.error(`Authentication failed: ${describeError(err)}`);
    process.exit(3);
  }
}

async function fetchActivitiesOrExit(services: Services) {
  try {
    return await services.api.fetchActivities();
  } catch (err) {
    console.error(`Failed to load activities: ${describeError(err)}`);
    process.exit(4);
  }
}

function guard<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    if (isSyncError(err, "CONFIG_ERROR")) {
      console.error(err.message);
      process.exit(2);
    }
    throw err;
  }
}

function describeMeans({ meanCarry, meanTotal }: { meanCarry: number | null; meanTotal: number | null }): string {
  return `mean carry ${meanCarry ?? "n/a"}, total ${meanTotal ?? "n/a"}`;
}

async function confirm(question: string): Promise<boolean> {
  if (!process.stdin.isTTY) {
    console.log("Not running in a terminal; re-run with --yes to download.");
    return false;
  }
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`${question} (y/n): `);
    return answer.trim().toLowerCase() === "y";
  } finally {
    rl.close();
  }
}
