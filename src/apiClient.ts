import type { BrowserAuthenticator, Credentials } from "./authenticator.js";
import { API_URL, DEFAULT_USER_AGENT } from "./config.js";
import { SyncError, describeError } from "./errors.js";
import { isRecord, pickPath, readString } from "./guards.js";
import { measurementTypeFor, parseShotSet } from "./shots.js";
import type { TokenCache } from "./tokenCache.js";
import type { Activity, BallType, ShotSet } from "./types.js";

const INTROSPECTION_QUERY = `
query {
  __schema {
    queryType {
      name
    }
  }
}`;

const ACTIVITIES_QUERY = `
query {
  me {
    activities {
      items {
        id
        time
        kind
        isHidden
      }
      totalCount
    }
  }
}`;

const SHOTS_QUERY = `
query GetActivityShots($id: ID!, $measurementType: RangeMeasurementTypes!) {
  node(id: $id) {
    ... on RangePracticeActivity {
      id
      kind
      time
      strokes {
        bayName
        time
        club
        measurement(measurementType: $measurementType) {
          ballSpeed
          ballSpin
          ballVelocity
          carry
          carryActual
          carrySide
          carrySideActual
          curve
          curveActual
          curveTotal
          curveTotalActual
          distanceFromPin
          distanceFromPinActual
          distanceFromPinTotal
          distanceFromPinTotalActual
          isValidMeasurement
          kind
          landingAngle
          launchAngle
          launchDirection
          maxHeight
          spinAxis
          targetDistance
          time
          total
          totalActual
          totalSide
          totalSideActual
          windVelocity
          ballSpinEffective
          reducedAccuracy
        }
      }
    }
  }
}`;

export interface GraphQLErrorEntry {
  message: string;
}

export interface GraphQLResponse {
  data: unknown;
  errors: GraphQLErrorEntry[];
}

export interface AuthenticateResult {
  token: string;
  username: string | null;
  source: "cache" | "browser";
}

export interface ApiClientOptions {
  cache: TokenCache;
  authenticator: Pick<BrowserAuthenticator, "authenticate">;
  endpoint?: string;
  fetch?: typeof fetch;
}

export class ApiClient {
  private token: string | null = null;
  private readonly endpoint: string;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: ApiClientOptions) {
    this.endpoint = options.endpoint ?? API_URL;
    this.fetchImpl = options.fetch ?? fetch;
  }

  useToken(token: string): void {
    this.token = token;
  }

  async authenticate({ username, password }: Credentials = {}): Promise<AuthenticateResult> {
    const { cache, authenticator } = this.options;

    if (username) {
      const cached = cache.get(username);
      if (cached) {
        console.log(`🔍 Testing saved token for ${username} …`);
        this.useToken(cached.token);
        if (await this.testConnection()) {
          console.log("✅ Saved token is valid.");
          return { token: cached.token, username, source: "cache" };
        }
        console.log("ℹ️  Saved token is no longer valid; proceeding with browser login …");
        this.token = null;
      }
    }

    const { token, email } = await authenticator.authenticate({ username, password });
    this.useToken(token);
    if (!(await this.testConnection())) {
      this.token = null;
      throw new SyncError("AUTH_REJECTED", "The API rejected the token recovered from the browser login.");
    }

    const identity = username || email;
    if (identity) {
      cache.save(identity, token);
    } else {
      console.warn("⚠️  No username or login email known; the token will not be cached.");
    }
    return { token, username: identity ?? null, source: "browser" };
  }

  async execute(query: string, variables: Record<string, unknown> = {}): Promise<GraphQLResponse> {
    if (!this.token) {
      throw new SyncError("AUTH_NOT_READY", "Not authenticated. Run `rangesync login` first.");
    }

    let response: Response;
    try {
      response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          "user-agent": DEFAULT_USER_AGENT,
          authorization: `Bearer ${this.token}`
        },
        body: JSON.stringify({ query, variables })
      });
    } catch (err) {
      throw new SyncError("TRANSPORT_ERROR", `POST ${this.endpoint} failed: ${describeError(err)}`, { cause: err });
    }

    if (!response.ok) {
      const text = await response.text().catch(() => "");
      if (text) {
        console.error(`   Response body: ${text.slice(0, 500)}`);
      }
      throw new SyncError(
        "SERVER_ERROR",
        `POST ${this.endpoint} failed: ${response.status} ${response.statusText} ${text.slice(0, 200)}`.trim(),
        { status: response.status, body: text }
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new SyncError("SERVER_ERROR", `POST ${this.endpoint} returned invalid JSON`, {
        status: response.status,
        cause: err
      });
    }
    if (!isRecord(payload)) {
      throw new SyncError("SERVER_ERROR", `POST ${this.endpoint} returned an unexpected response shape`, {
        status: response.status
      });
    }

    return { data: payload.data ?? null, errors: parseErrors(payload.errors) };
  }

  async testConnection(): Promise<boolean> {
    try {
      const result = await this.execute(INTROSPECTION_QUERY);
      return isRecord(result.data);
    } catch (err) {
      console.warn(`⚠️  Connection test failed: ${describeError(err)}`);
      return false;
    }
  }

  async fetchActivities(): Promise<Activity[]> {
    const result = await this.execute(ACTIVITIES_QUERY);
    const items = pickPath(result.data, ["me", "activities", "items"]);
    if (!Array.isArray(items)) {
      throw graphqlFailure("activity list", result);
    }

    const activities: Activity[] = [];
    for (const item of items) {
      const activity = parseActivity(item);
      if (activity) {
        activities.push(activity);
      } else {
        console.warn("Skipping activity with missing id or time:", JSON.stringify(item));
      }
    }
    return activities;
  }

  async fetchShots(activityId: string, ballType: BallType): Promise<ShotSet> {
    const result = await this.execute(SHOTS_QUERY, {
      id: activityId,
      measurementType: measurementTypeFor(ballType)
    });
    const node = pickPath(result.data, ["node"]);
    if (node == null && result.errors.length > 0) {
      throw graphqlFailure(`shots for activity ${activityId}`, result);
    }
    return parseShotSet(activityId, node);
  }
}

function parseActivity(item: unknown): Activity | null {
  if (!isRecord(item)) return null;
  const id = readString(item, "id");
  const time = readString(item, "time");
  if (!id || !time) return null;
  return {
    id,
    time,
    kind: readString(item, "kind") ?? "UNKNOWN",
    isHidden: item.isHidden === true
  };
}

function parseErrors(raw: unknown): GraphQLErrorEntry[] {
  if (!Array.isArray(raw)) return [];
  return raw.map((entry) => ({
    message: isRecord(entry) ? readString(entry, "message") ?? "unknown error" : String(entry)
  }));
}

function graphqlFailure(what: string, result: GraphQLResponse): SyncError {
  const detail = result.errors.map((e) => e.message).join("; ") || "no data returned";
  return new SyncError("SERVER_ERROR", `Could not load ${what}: ${detail}`, { body: JSON.stringify(result.errors) });
}
