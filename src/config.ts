import os from "node:os";
import path from "node:path";
import { DateTime } from "luxon";
import { SyncError } from "./errors.js";

export const API_URL = "https://api.trackmangolf.com/graphql";
export const AUTHORIZE_URL = "https://login.trackmangolf.com/connect/authorize";
export const CLIENT_ID = "dr-web.4633fada-3b16-490f-8de7-2aa67158a1d6";
export const REDIRECT_URI = "https://portal.trackmangolf.com/account/callback";
export const SCOPES = [
  "openid",
  "profile",
  "email",
  "offline_access",
  "https://auth.trackman.com/dr/cloud",
  "https://auth.trackman.com/authorization",
  "https://auth.trackman.com/proamevent"
];

export const LOGIN_SELECTORS = {
  email: "input#Email, input[name='Email'], input.email-input",
  password: "input#Password, input[name='Password'], input.password-input",
  submit: "button[type='submit'], input[type='submit']",
  landing: "#ga4-activities-card"
};

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/122.0.0.0 Safari/537.36";

const DEFAULT_HOME = path.join(os.homedir(), "rangesync");
const DEFAULT_TOKEN_TTL_DAYS = 30;
const DEFAULT_LOGIN_TIMEOUT_MS = 120_000;
const DEFAULT_FORM_TIMEOUT_MS = 30_000;

export interface SyncConfig {
  homeDir: string;
  dataDir: string;
  tokenDir: string;
  tokenTtlDays: number;
  timezone: string | null;
  apiUrl: string;
  loginTimeoutMs: number;
  formTimeoutMs: number;
  browserChannel: string | null;
  browserPath: string | null;
  headed: boolean;
}

export interface ConfigOptions {
  home?: string;
  tokenTtlDays?: string | number;
  tz?: string;
  headed?: boolean;
}

export function resolveConfig(options: ConfigOptions = {}, env: NodeJS.ProcessEnv = process.env): SyncConfig {
  const homeDir = path.resolve(pickString(options.home, env.RANGESYNC_HOME) ?? DEFAULT_HOME);

  return {
    homeDir,
    dataDir: path.join(homeDir, "data"),
    tokenDir: path.join(homeDir, "tokens"),
    tokenTtlDays: parsePositiveNumber(
      "token TTL (days)",
      options.tokenTtlDays ?? env.RANGESYNC_TOKEN_TTL_DAYS,
      DEFAULT_TOKEN_TTL_DAYS
    ),
    timezone: parseTimezone(pickString(options.tz, env.RANGESYNC_TZ)),
    apiUrl: pickString(env.RANGESYNC_API_URL) ?? API_URL,
    loginTimeoutMs: parsePositiveNumber("login timeout (ms)", env.RANGESYNC_LOGIN_TIMEOUT_MS, DEFAULT_LOGIN_TIMEOUT_MS),
    formTimeoutMs: DEFAULT_FORM_TIMEOUT_MS,
    browserChannel: pickString(env.RANGESYNC_BROWSER_CHANNEL),
    browserPath: pickString(env.RANGESYNC_BROWSER_PATH),
    headed: options.headed === true || env.RANGESYNC_HEADED === "1"
  };
}

function pickString(...values: Array<string | undefined>): string | null {
  for (const value of values) {
    if (typeof value !== "string") continue;
    const trimmed = value.trim();
    if (trimmed) return trimmed;
  }
  return null;
}

/** Accepts whatever luxon's `setZone` accepts: IANA names, `UTC`, fixed offsets like `UTC+2`. */
function parseTimezone(zone: string | null): string | null {
  if (zone == null) return null;
  if (!DateTime.now().setZone(zone).isValid) {
    throw new SyncError("CONFIG_ERROR", `time zone must be an IANA zone name or a UTC offset, got '${zone}'.`);
  }
  return zone;
}

function parsePositiveNumber(label: string, raw: string | number | undefined, fallback: number): number {
  if (raw == null) return fallback;
  const str = String(raw).trim();
  if (!str) return fallback;
  const value = Number(str);
  if (!Number.isFinite(value) || value <= 0) {
    throw new SyncError("CONFIG_ERROR", `${label} must be a positive number, got '${str}'.`);
  }
  return value;
}
