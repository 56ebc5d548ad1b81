import { AUTHORIZE_URL, CLIENT_ID, LOGIN_SELECTORS, REDIRECT_URI, SCOPES } from "./config.js";
import type { BrowserSession, InterceptedRequest } from "./browserSession.js";
import { SyncError, describeError } from "./errors.js";
import { getHeaderValue, isRecord, readString } from "./guards.js";
import { buildAuthorizationUrl, createPkcePair } from "./pkce.js";

export type AuthState = "IDLE" | "AWAITING_TRAFFIC" | "TOKEN_RECOVERED" | "FAILED";

export interface Credentials {
  username?: string | null;
  password?: string | null;
}

export interface BrowserAuthResult {
  token: string;
  /** Login email seen in the intercepted traffic, if any. */
  email: string | null;
}

export interface BrowserAuthenticatorOptions {
  /** `interactive` is true when the operator has to type the credentials. */
  openSession: (opts: { interactive: boolean }) => Promise<BrowserSession>;
  loginTimeoutMs: number;
  formTimeoutMs: number;
  authorizeUrl?: string;
  clientId?: string;
  redirectUri?: string;
  scopes?: string[];
  selectors?: typeof LOGIN_SELECTORS;
}

type RequestOutcome = { ok: true; request: InterceptedRequest | null } | { ok: false; error: unknown };

const BEARER_PATTERN = /^Bearer\s+(\S+)\s*$/i;

export class BrowserAuthenticator {
  state: AuthState = "IDLE";

  constructor(private readonly options: BrowserAuthenticatorOptions) {}

  async authenticate({ username, password }: Credentials = {}): Promise<BrowserAuthResult> {
    const {
      openSession,
      loginTimeoutMs,
      authorizeUrl = AUTHORIZE_URL,
      clientId = CLIENT_ID,
      redirectUri = REDIRECT_URI,
      scopes = SCOPES,
      selectors = LOGIN_SELECTORS
    } = this.options;

    this.state = "IDLE";
    const authUrl = buildAuthorizationUrl({ authorizeUrl, clientId, redirectUri, scopes, pkce: createPkcePair() });
    const interactive = !(username && password);
    const session = await openSession({ interactive });
    const observed: { email: string | null } = { email: null };

    try {
      this.state = "AWAITING_TRAFFIC";
      // Settled up front: the wait can reject (window closed) while navigation is still awaited.
      const pending: Promise<RequestOutcome> = session
        .waitForRequest((req) => {
          observed.email ??= extractEmail(req.body);
          return extractBearerToken(req.headers) !== null;
        }, loginTimeoutMs)
        .then(
          (request): RequestOutcome => ({ ok: true, request }),
          (error: unknown): RequestOutcome => ({ ok: false, error })
        );

      console.log("🔐 Navigating to login page …");
      await session.goto(authUrl);

      if (username && password) {
        await this.submitCredentials(session, username, password);
      } else {
        console.log("👤 Complete the login in the browser window …");
      }

      console.log("⏳ Waiting for the activities page and an authorized request …");
      const landed = await session.waitForElement(selectors.landing, loginTimeoutMs);
      if (!landed) {
        console.warn("⚠️  Landing page marker did not appear; still waiting for a bearer token.");
      }

      const outcome = await pending;
      if (!outcome.ok) throw outcome.error;
      const token = outcome.request ? extractBearerToken(outcome.request.headers) : null;
      if (!token) {
        throw new SyncError(
          "AUTH_TIMEOUT",
          `No authorized request observed within ${Math.round(loginTimeoutMs / 1000)}s.`
        );
      }

      this.state = "TOKEN_RECOVERED";
      console.log("💯 Bearer token recovered.");
      return { token, email: observed.email };
    } catch (err) {
      this.state = "FAILED";
      throw err;
    } finally {
      await session.close().catch((err: unknown) => {
        console.warn(`⚠️  Browser did not close cleanly: ${describeError(err)}`);
      });
    }
  }

  private async submitCredentials(session: BrowserSession, username: string, password: string) {
    const { formTimeoutMs, selectors = LOGIN_SELECTORS } = this.options;

    console.log("✏️ Filling login form and submitting …");
    if (!(await session.waitForElement(selectors.email, formTimeoutMs))) {
      throw new SyncError("AUTH_TIMEOUT", "Login form email field did not appear.");
    }
    await session.fill(selectors.email, username);

    if (!(await session.waitForElement(selectors.password, formTimeoutMs))) {
      throw new SyncError("AUTH_TIMEOUT", "Login form password field did not appear.");
    }
    await session.fill(selectors.password, password);
    await session.click(selectors.submit);
  }
}

export function extractBearerToken(headers: Record<string, string>): string | null {
  const value = getHeaderValue(headers, "authorization");
  if (!value) return null;
  const match = BEARER_PATTERN.exec(value.trim());
  return match?.[1] ?? null;
}

export function extractEmail(body: string | null): string | null {
  if (!body) return null;

  let candidate: string | null = null;
  try {
    const parsed: unknown = JSON.parse(body);
    if (isRecord(parsed)) {
      candidate = readString(parsed, "email") ?? readString(parsed, "Email");
    }
  } catch {
    const form = new URLSearchParams(body);
    candidate = form.get("email") ?? form.get("Email");
  }

  const trimmed = candidate?.trim();
  return trimmed && trimmed.includes("@") ? trimmed : null;
}
