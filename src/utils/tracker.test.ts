import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Tracker } from "./tracker";
import {
  FetchFailedError,
  HttpError,
  InvalidRecordError,
  RequestTimeoutError,
  RetriesExhaustedError,
  TranslationFailedError,
} from "./errors";

describe("Tracker", () => {
  it("walks records through their lifecycle", () => {
    const tracker = new Tracker();
    tracker.select(0, "translation");
    expect(tracker.getState(0, "translation")).toBe("pending");

    tracker.transition(0, "translation", "in-progress");
    tracker.complete(0, "translation");

    expect(tracker.getState(0, "translation")).toBe("done");
    expect(tracker.getState(0, "download")).toBeUndefined();
    expect(tracker.finished("translation")).toBe(1);
  });

  it("rejects transitions the lifecycle does not allow", () => {
    const tracker = new Tracker();
    tracker.select(0, "download");

    expect(() => tracker.complete(0, "download")).toThrow(
      "Invalid download transition for record #0: pending -> done",
    );
    expect(() => tracker.transition(1, "download", "in-progress")).toThrow(
      "Invalid download transition for record #1: unselected -> in-progress",
    );
  });

  it("lets interrupted records fall back to pending", () => {
    const tracker = new Tracker();
    tracker.select(3, "translation");
    tracker.transition(3, "translation", "in-progress");
    tracker.transition(3, "translation", "pending");

    const summary = tracker.getSummary("translate");
    expect(summary.translation.pending).toBe(1);
    expect(summary.translation.selected).toBe(1);
  });

  it("counts cached downloads as skipped", () => {
    const tracker = new Tracker();
    tracker.select(0, "download");
    tracker.transition(0, "download", "in-progress");
    tracker.complete(0, "download", true);

    const summary = tracker.getSummary("download");
    expect(summary.downloaded).toBe(0);
    expect(summary.download.skipped).toBe(1);
  });

  it("maps failures to issue reasons", () => {
    const tracker = new Tracker();
    for (const index of [0, 1, 2]) {
      tracker.select(index, "translation");
      tracker.transition(index, "translation", "in-progress");
    }
    tracker.select(0, "download");
    tracker.transition(0, "download", "in-progress");

    const exhausted = tracker.fail(
      0,
      "translation",
      "#0",
      new RetriesExhaustedError(
        4,
        new TranslationFailedError("categories[1]", new RequestTimeoutError("u", 10)),
      ),
    );
    const timeout = tracker.fail(
      1,
      "translation",
      "#1",
      new TranslationFailedError("title", new RequestTimeoutError("u", 10)),
    );
    const rejected = tracker.fail(
      2,
      "translation",
      "#2",
      new TranslationFailedError("title", new HttpError("u", 403, "Forbidden")),
    );
    const invalid = tracker.fail(
      0,
      "download",
      "#0",
      new FetchFailedError("", new InvalidRecordError("Record has no image_url")),
    );

    expect(exhausted).toMatchObject({ reason: "retries-exhausted", field: "categories[1]" });
    expect(timeout).toMatchObject({ reason: "timeout", field: "title" });
    expect(rejected).toMatchObject({ reason: "rejected" });
    expect(invalid).toMatchObject({
      type: "download",
      reason: "invalid-record",
      details: "Fetching <missing url> failed: Record has no image_url",
    });
    expect(tracker.getSummary("both").failed).toBe(4);
    expect(tracker.getIssues("download")).toHaveLength(1);
  });

  it("records configuration problems as resource issues", () => {
    const tracker = new Tracker();
    tracker.trackResourceError("config.json", new SyntaxError("Unexpected token"));

    expect(tracker.getIssues("resource")).toEqual([
      { type: "resource", path: "config.json", reason: "invalid-json", details: "Unexpected token" },
    ]);
    expect(tracker.getFailures()).toEqual([]);
  });

  describe("exportStats", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await mkdtemp(join(tmpdir(), "tracker-"));
    });

    afterEach(async () => {
      await rm(dir, { recursive: true, force: true });
    });

    it("groups issues by type and reason", async () => {
      const tracker = new Tracker();
      tracker.setTotalRecords(1);
      tracker.select(0, "download");
      tracker.transition(0, "download", "in-progress");
      tracker.fail(0, "download", "#0", new FetchFailedError("u", new HttpError("u", 404, "Not Found")), "u");

      const path = join(dir, "stats.json");
      await tracker.exportStats(path, "download");
      const exported = JSON.parse(await readFile(path, "utf-8"));

      expect(exported.summary.totalRecords).toBe(1);
      expect(exported.summary.failed).toBe(1);
      expect(exported.summary.failures).toBeUndefined();
      expect(Object.keys(exported.issues.download)).toEqual(["rejected"]);
      expect(exported.issues.download.rejected[0].url).toBe("u");
    });
  });
});
