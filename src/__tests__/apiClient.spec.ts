import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from "vitest";

import { ApiClient } from "../apiClient.js";
import type { BrowserAuthResult } from "../authenticator.js";
import { TokenCache } from "../tokenCache.js";

const ENDPOINT = "https://api.example.test/graphql";
const SCHEMA_OK = { data: { __schema: { queryType: { name: "Query" } } } };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

describe("ApiClient", () => {
  let dir: string;
  let cache: TokenCache;
  let fetchMock: Mock<typeof fetch>;
  let browserLogin: Mock<() => Promise<BrowserAuthResult>>;
  let client: ApiClient;

  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "rangesync-api-"));
    cache = new TokenCache({ dir, ttlDays: 30 });
    fetchMock = vi.fn<typeof fetch>();
    browserLogin = vi.fn<() => Promise<BrowserAuthResult>>();
    client = new ApiClient({ cache, authenticator: { authenticate: browserLogin }, endpoint: ENDPOINT, fetch: fetchMock });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("execute", () => {
    it("refuses to run without a token", async () => {
      await expect(client.execute("query { me { id } }")).rejects.toMatchObject({ code: "AUTH_NOT_READY" });
      expect(fetchMock).not.toHaveBeenCalled();
    });

    it("posts the query with the bearer token", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { me: { id: "u1" } } }));
      client.useToken("test-token");

      const result = await client.execute("query { me { id } }", { first: 1 });

      expect(result).toEqual({ data: { me: { id: "u1" } }, errors: [] });
      const [url, init] = fetchMock.mock.calls[0];
      expect(url).toBe(ENDPOINT);
      expect(init?.method).toBe("POST");
      const headers = new Headers(init?.headers);
      expect(headers.get("authorization")).toBe("Bearer test-token");
      expect(headers.get("content-type")).toBe("application/json");
      expect(JSON.parse(String(init?.body))).toEqual({ query: "query { me { id } }", variables: { first: 1 } });
    });

    it("returns GraphQL errors alongside partial data", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: null, errors: [{ message: "not allowed" }, "odd"] }));
      client.useToken("test-token");

      await expect(client.execute("query { me { id } }")).resolves.toEqual({
        data: null,
        errors: [{ message: "not allowed" }, { message: "odd" }]
      });
    });

    it("wraps network failures as TRANSPORT_ERROR", async () => {
      fetchMock.mockRejectedValueOnce(new TypeError("fetch failed"));
      client.useToken("test-token");

      await expect(client.execute("query { me { id } }")).rejects.toMatchObject({ code: "TRANSPORT_ERROR" });
    });

    it("surfaces non-success responses as SERVER_ERROR with the body", async () => {
      fetchMock.mockResolvedValueOnce(new Response("upstream exploded", { status: 502 }));
      client.useToken("test-token");

      await expect(client.execute("query { me { id } }")).rejects.toMatchObject({
        code: "SERVER_ERROR",
        status: 502,
        body: "upstream exploded"
      });
      expect(console.error).toHaveBeenCalledWith("   Response body: upstream exploded");
    });

    it("rejects bodies that are not JSON objects", async () => {
      fetchMock.mockResolvedValueOnce(new Response("<html>", { status: 200 }));
      fetchMock.mockResolvedValueOnce(jsonResponse([1, 2]));
      client.useToken("test-token");

      await expect(client.execute("query { me { id } }")).rejects.toMatchObject({ code: "SERVER_ERROR" });
      await expect(client.execute("query { me { id } }")).rejects.toMatchObject({ code: "SERVER_ERROR" });
    });
  });

  describe("authenticate", () => {
    it("reuses a cached token that still works", async () => {
      cache.save("alice", "cached-token");
      fetchMock.mockResolvedValueOnce(jsonResponse(SCHEMA_OK));

      const result = await client.authenticate({ username: "alice" });

      expect(result).toEqual({ token: "cached-token", username: "alice", source: "cache" });
      expect(browserLogin).not.toHaveBeenCalled();

      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { me: { id: "u1" } } }));
      await client.execute("query { me { id } }");
      const [, init] = fetchMock.mock.calls[1];
      expect(new Headers(init?.headers).get("authorization")).toBe("Bearer cached-token");
    });

    it("falls back to the browser when the cached token is rejected", async () => {
      cache.save("alice", "cached-token");
      fetchMock.mockResolvedValueOnce(new Response("unauthorized", { status: 401 }));
      fetchMock.mockResolvedValueOnce(jsonResponse(SCHEMA_OK));
      browserLogin.mockResolvedValueOnce({ token: "fresh-token", email: "alice@example.com" });

      const result = await client.authenticate({ username: "alice" });

      expect(result).toEqual({ token: "fresh-token", username: "alice", source: "browser" });
      expect(browserLogin).toHaveBeenCalledTimes(1);
      expect(cache.get("alice")?.token).toBe("fresh-token");
      const [, init] = fetchMock.mock.calls[1];
      expect(new Headers(init?.headers).get("authorization")).toBe("Bearer fresh-token");
    });

    it("saves the token under the login email when no username is given", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(SCHEMA_OK));
      browserLogin.mockResolvedValueOnce({ token: "fresh-token", email: "player@example.com" });

      const result = await client.authenticate();

      expect(result).toEqual({ token: "fresh-token", username: "player@example.com", source: "browser" });
      expect(Object.keys(cache.load())).toEqual(["player@example.com"]);
    });

    it("does not cache a token it cannot attribute", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse(SCHEMA_OK));
      browserLogin.mockResolvedValueOnce({ token: "fresh-token", email: null });

      const result = await client.authenticate();

      expect(result.username).toBeNull();
      expect(cache.load()).toEqual({});
      expect(fs.existsSync(cache.filePath)).toBe(false);
    });

    it("rejects a browser token the API does not accept", async () => {
      fetchMock.mockResolvedValueOnce(new Response("unauthorized", { status: 401 }));
      browserLogin.mockResolvedValueOnce({ token: "fresh-token", email: "player@example.com" });

      await expect(client.authenticate({ username: "alice" })).rejects.toMatchObject({ code: "AUTH_REJECTED" });
      await expect(client.execute("query { me { id } }")).rejects.toMatchObject({ code: "AUTH_NOT_READY" });
      expect(cache.load()).toEqual({});
    });
  });

  describe("queries", () => {
    beforeEach(() => {
      client.useToken("test-token");
    });

    it("parses the activity list and skips incomplete items", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          data: {
            me: {
              activities: {
                items: [
                  { id: "a1", time: "2024-05-01T08:00:00Z", kind: "RANGE_PRACTICE", isHidden: true },
                  { id: "a2", time: "2024-05-01T09:30:00Z" },
                  { time: "2024-05-02T08:00:00Z", kind: "RANGE_PRACTICE" }
                ],
                totalCount: 3
              }
            }
          }
        })
      );

      await expect(client.fetchActivities()).resolves.toEqual([
        { id: "a1", time: "2024-05-01T08:00:00Z", kind: "RANGE_PRACTICE", isHidden: true },
        { id: "a2", time: "2024-05-01T09:30:00Z", kind: "UNKNOWN", isHidden: false }
      ]);
    });

    it("fails when the activity list is absent", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: null, errors: [{ message: "not authorized" }] }));

      await expect(client.fetchActivities()).rejects.toMatchObject({
        code: "SERVER_ERROR",
        message: "Could not load activity list: not authorized"
      });
    });

    it("requests the measurement type for the ball type and normalizes shots", async () => {
      fetchMock.mockResolvedValueOnce(
        jsonResponse({
          data: {
            node: {
              id: "a1",
              kind: "RANGE_PRACTICE",
              time: "2024-05-01T08:00:00Z",
              strokes: [
                {
                  time: "2024-05-01T08:01:00Z",
                  club: "Driver",
                  bayName: "12",
                  measurement: { ballSpeed: 40, carry: 150.26, ballSpinEffective: null, reducedAccuracy: false }
                },
                { time: null, club: null, bayName: null, measurement: null }
              ]
            }
          }
        })
      );

      const shotSet = await client.fetchShots("a1", "RANGE");

      const [, init] = fetchMock.mock.calls[0];
      expect(JSON.parse(String(init?.body)).variables).toEqual({ id: "a1", measurementType: "SITE_MEASUREMENT" });
      expect(shotSet.activityId).toBe("a1");
      expect(shotSet.shots).toEqual([
        {
          time: "2024-05-01T08:01:00Z",
          club: "Driver",
          bayName: "12",
          measurement: { ballSpeed: 144, carry: 150.3, ballSpinEffective: "None", reducedAccuracy: "No" }
        },
        {
          time: null,
          club: null,
          bayName: null,
          measurement: { ballSpinEffective: "None", reducedAccuracy: "No" }
        }
      ]);
    });

    it("asks for pro ball measurements for premium shots", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { node: null } }));

      const shotSet = await client.fetchShots("a1", "PREMIUM");

      const [, init] = fetchMock.mock.calls[0];
      expect(JSON.parse(String(init?.body)).variables.measurementType).toBe("PRO_BALL_MEASUREMENT");
      expect(shotSet.shots).toEqual([]);
    });

    it("fails when the node is missing and the server reported errors", async () => {
      fetchMock.mockResolvedValueOnce(jsonResponse({ data: { node: null }, errors: [{ message: "no such node" }] }));

      await expect(client.fetchShots("a1", "PREMIUM")).rejects.toMatchObject({
        code: "SERVER_ERROR",
        message: "Could not load shots for activity a1: no such node"
      });
    });
  });
});
