import { describe, it, expect } from "vitest";
import { ColumnSpec } from "../types/column.js";
import { Vocabulary, validateColumn } from "./vocabulary.js";

describe("Vocabulary", () => {
  it("canonicalizes case-insensitively", () => {
    const vocabulary = new Vocabulary(["JobID", "State"]);
    expect(vocabulary.canonicalize("jobid")).toBe("JobID");
    expect(vocabulary.canonicalize("STATE")).toBe("State");
    expect(vocabulary.canonicalize("bogus")).toBeUndefined();
  });

  it("keeps the first casing when titles collide", () => {
    const vocabulary = new Vocabulary(["ReqMem", "REQMEM"]);
    expect(vocabulary.canonicalize("reqmem")).toBe("ReqMem");
    expect(vocabulary.titles()).toEqual(["ReqMem"]);
  });

  it("lists titles in registration order", () => {
    expect(new Vocabulary(["State", "JobID", "CPUEff"]).titles()).toEqual([
      "State",
      "JobID",
      "CPUEff",
    ]);
  });
});

describe("validateColumn", () => {
  const vocabulary = new Vocabulary(["JobID", "State"]);

  it("rewrites the name to the vocabulary casing", () => {
    const result = validateColumn(new ColumnSpec("jobid", ">", 6), vocabulary);
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.value.name).toBe("JobID");
    expect(result.value.alignment).toBe(">");
    expect(result.value.width).toBe(6);
  });

  it("fails for an unknown title", () => {
    const result = validateColumn(new ColumnSpec("bogus"), vocabulary);
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("unknown-title");
    expect(result.error.title).toBe("bogus");
    expect(result.error.message).toBe("'bogus' is not a valid title");
  });
});
