import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { artifactFileName, artifactPath, parseArtifactFileName } from "../artifacts.js";
import { SessionInventory, emptyInventory, hasSession } from "../inventory.js";

describe("artifact names", () => {
  it("encodes the scheme version, day, session and ball type", () => {
    expect(artifactFileName({ date: "20240501", sessionNumber: 2 }, "PREMIUM")).toBe(
      "rangesync-v1_20240501_session2_pro.csv"
    );
    expect(artifactFileName({ date: "20240501", sessionNumber: 1 }, "RANGE")).toBe(
      "rangesync-v1_20240501_session1_range.csv"
    );
  });

  it("parses its own names", () => {
    expect(parseArtifactFileName("rangesync-v1_20240501_session12_range.csv")).toEqual({
      key: { date: "20240501", sessionNumber: 12 },
      ballType: "RANGE"
    });
  });

  it("rejects foreign, stale or impossible names", () => {
    expect(parseArtifactFileName("rangesync-v2_20240501_session1_pro.csv")).toBeNull();
    expect(parseArtifactFileName("rangesync-v1_20241301_session1_pro.csv")).toBeNull();
    expect(parseArtifactFileName("rangesync-v1_20240501_session0_pro.csv")).toBeNull();
    expect(parseArtifactFileName("rangesync-v1_20240501_session1_pro.csv.partial")).toBeNull();
    expect(parseArtifactFileName("notes.txt")).toBeNull();
  });

  it("places files under the user namespace when one is given", () => {
    const key = { date: "20240501", sessionNumber: 1 };
    expect(artifactPath("/data", key, "PREMIUM")).toBe(path.join("/data", "pro", "rangesync-v1_20240501_session1_pro.csv"));
    expect(artifactPath("/data", key, "RANGE", "alice")).toBe(
      path.join("/data", "alice", "range", "rangesync-v1_20240501_session1_range.csv")
    );
  });
});

describe("SessionInventory", () => {
  let dataDir: string;

  function touch(...segments: string[]) {
    const file = path.join(dataDir, ...segments);
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, "Shot Number\n");
  }

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "rangesync-inventory-"));
  });

  afterEach(() => {
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("is empty when nothing has been saved", () => {
    const inventory = new SessionInventory(path.join(dataDir, "missing")).scan();
    expect(inventory).toEqual(emptyInventory());
  });

  it("collects saved sessions per ball type and ignores other files", () => {
    touch("pro", "rangesync-v1_20240501_session1_pro.csv");
    touch("range", "rangesync-v1_20240501_session1_range.csv");
    touch("range", "rangesync-v1_20240501_session2_range.csv");
    touch("range", "rangesync-v1_20240502_session1_pro.csv");
    touch("range", "rangesync-v1_20240503_session1_range.csv.partial");
    touch("pro", "README.md");

    const inventory = new SessionInventory(dataDir).scan();

    expect([...inventory.pro]).toEqual(["20240501#1"]);
    expect([...inventory.range].sort()).toEqual(["20240501#1", "20240501#2"]);
    expect(hasSession(inventory, { date: "20240501", sessionNumber: 2 }, "RANGE")).toBe(true);
    expect(hasSession(inventory, { date: "20240501", sessionNumber: 2 }, "PREMIUM")).toBe(false);
  });

  it("keeps user namespaces apart", () => {
    touch("alice", "pro", "rangesync-v1_20240501_session1_pro.csv");
    touch("pro", "rangesync-v1_20240601_session1_pro.csv");

    const sessions = new SessionInventory(dataDir);
    expect([...sessions.scan("alice").pro]).toEqual(["20240501#1"]);
    expect([...sessions.scan().pro]).toEqual(["20240601#1"]);
    expect(sessions.scan("bob")).toEqual(emptyInventory());
  });

  it("lists saved sessions in day, session and ball type order", () => {
    touch("range", "rangesync-v1_20240502_session1_range.csv");
    touch("pro", "rangesync-v1_20240501_session2_pro.csv");
    touch("range", "rangesync-v1_20240501_session2_range.csv");
    touch("pro", "rangesync-v1_20240501_session1_pro.csv");

    const listed = new SessionInventory(dataDir)
      .listSessions()
      .map((entry) => `${entry.key.date}#${entry.key.sessionNumber}:${entry.ballType}`);

    expect(listed).toEqual(["20240501#1:PREMIUM", "20240501#2:PREMIUM", "20240501#2:RANGE", "20240502#1:RANGE"]);
  });

  it("lists user namespaces without the shared ball type folders", () => {
    touch("pro", "rangesync-v1_20240501_session1_pro.csv");
    touch("bob", "range", "rangesync-v1_20240501_session1_range.csv");
    touch("alice", "pro", "rangesync-v1_20240501_session1_pro.csv");
    touch("stray.txt");

    expect(new SessionInventory(dataDir).listUsers()).toEqual(["alice", "bob"]);
  });
});
