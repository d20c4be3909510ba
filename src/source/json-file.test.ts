/**
 * Tests for the JSON file job source.
 *
 * The reader is injected, so no file is touched.
 */

import { describe, it, expect } from "vitest";
import { createJsonFileSource, parseJobDocument } from "./json-file.js";

describe("createJsonFileSource", () => {
  it("loads job records", async () => {
    const source = createJsonFileSource("jobs.json", async () =>
      '[{"JobID": "101", "State": "COMPLETED"}]',
    );
    const result = await source.load();
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual([{ JobID: "101", State: "COMPLETED" }]);
  });

  it("stringifies numbers and blanks nulls", async () => {
    const source = createJsonFileSource("jobs.json", async () =>
      '[{"JobID": 101, "AllocCPUS": 4, "MaxRSS": null}]',
    );
    const result = await source.load();
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value).toEqual([{ JobID: "101", AllocCPUS: "4", MaxRSS: "" }]);
  });

  it("reports read failures", async () => {
    const source = createJsonFileSource("missing.json", async () => {
      throw new Error("ENOENT");
    });
    const result = await source.load();
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.sourceId).toBe("missing.json");
    expect(result.error.message).toBe("Failed to read missing.json: ENOENT");
  });

  it("reports malformed JSON", async () => {
    const source = createJsonFileSource("jobs.json", async () => "[{");
    const result = await source.load();
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toMatch(/^Failed to parse jobs\.json: /);
  });
});

describe("parseJobDocument", () => {
  it("rejects a document that is not an array", () => {
    const result = parseJobDocument("doc", { JobID: "1" });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toMatch(/^Invalid job document: /);
  });

  it("points at the offending field", () => {
    const result = parseJobDocument("doc", [{ JobID: "1" }, { JobID: true }]);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message).toMatch(/^Invalid job document at 1\.JobID: /);
  });
});
