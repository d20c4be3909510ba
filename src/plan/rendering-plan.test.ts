/**
 * Tests for the rendering plan builder.
 *
 * The plan parses the format string, validates titles, adds mandatory
 * columns and resolves the fields to fetch, then renders job rows.
 */

import { describe, it, expect } from "vitest";
import { createRenderingPlan, DEFAULT_FORMAT } from "./rendering-plan.js";
import type { RenderingPlan } from "./rendering-plan.js";
import { SACCT_FIELDS } from "../source/sacct-fields.js";

const FIELDS = [
  "JobID",
  "JobIDRaw",
  "State",
  "Elapsed",
  "TotalCPU",
  "AllocCPUS",
  "REQMEM",
  "NNodes",
  "MaxRSS",
  "Timelimit",
  "JobName",
];

function buildPlan(format?: string): RenderingPlan {
  const result = createRenderingPlan(FIELDS, format);
  if (!result.ok) {
    throw new Error(result.error.message);
  }
  return result.value;
}

describe("createRenderingPlan", () => {
  it("uses the default format", () => {
    const plan = buildPlan();
    expect(plan.displayColumns.map((c) => c.toString())).toEqual([
      "JobID%>",
      "State%^",
      "Elapsed%>",
      "CPUEff%^",
      "MemEff%^",
    ]);
    expect(DEFAULT_FORMAT).toBe("JobID%>,State,Elapsed%>,CPUEff,MemEff");
  });

  it("shows only the mandatory columns for an empty format", () => {
    const plan = buildPlan("");
    expect(plan.displayColumns.map((c) => c.toString())).toEqual(["JobID%>", "State%^"]);
  });

  it("canonicalizes requested titles", () => {
    const plan = buildPlan("jobname%<,cpueff");
    expect(plan.displayColumns.map((c) => c.name)).toEqual([
      "JobID",
      "State",
      "JobName",
      "CPUEff",
    ]);
  });

  it("keeps duplicate display columns", () => {
    const plan = buildPlan("Elapsed,elapsed%>");
    expect(plan.displayColumns.map((c) => c.toString())).toEqual([
      "JobID%>",
      "State%^",
      "Elapsed%^",
      "Elapsed%>",
    ]);
  });

  it("resolves query columns for a derived field", () => {
    const plan = buildPlan("CPUEff");
    expect(plan.queryColumns()).toEqual(
      new Set(["TotalCPU", "AllocCPUS", "Elapsed", "JobID", "JobIDRaw", "State"]),
    );
  });

  it("requests each field once whatever the catalog casing", () => {
    const result = createRenderingPlan(SACCT_FIELDS, "MemEff,reqmem");
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect([...result.value.queryColumns()]).toEqual([
      "JobID",
      "State",
      "ReqMem",
      "NNodes",
      "AllocCPUS",
      "MaxRSS",
      "JobIDRaw",
    ]);
  });

  it("rejects a width too large to render", () => {
    const result = createRenderingPlan(SACCT_FIELDS, "State%99999999999");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("format");
  });

  it("returns the same query set every time", () => {
    const plan = buildPlan();
    expect(plan.queryColumns()).toEqual(plan.queryColumns());
  });

  it("fails with a format error", () => {
    const result = createRenderingPlan(FIELDS, "JobID,Foo%Q5");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toEqual({
      kind: "format",
      token: "Foo%Q5",
      message: "Unable to parse format token 'Foo%Q5'",
    });
  });

  it("fails with an unknown title", () => {
    const result = createRenderingPlan(FIELDS, "State,bogus");
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe("unknown-title");
    expect(result.error.message).toBe("'bogus' is not a valid title");
  });

  it("accepts derived fields absent from the vocabulary", () => {
    const result = createRenderingPlan(["JobID", "State"], "TimeEff");
    expect(result.ok).toBe(true);
  });

  it("honors a custom derived-field catalog", () => {
    const result = createRenderingPlan(FIELDS, "GPUEff", {
      derivedFields: new Map([["GPUEff", ["AllocTRES", "Elapsed"]]]),
      required: ["JobIDRaw"],
    });
    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect([...result.value.queryColumns()]).toEqual([
      "JobID",
      "State",
      "AllocTRES",
      "Elapsed",
      "JobIDRaw",
    ]);
  });
});

describe("RenderingPlan.renderTable", () => {
  it("renders header and rows with derived widths", () => {
    const plan = buildPlan("JobName%<");
    const table = plan.renderTable(
      [
        { JobID: "1234", State: "RUNNING", JobName: "train" },
        { JobID: "98", State: "PD", JobName: "x" },
      ],
      { noColor: true },
    );
    expect(table.split("\n")).toEqual([
      "JobID   State   JobName",
      " 1234  RUNNING  train  ",
      "   98    PD     x      ",
    ]);
  });

  it("renders missing fields as blanks", () => {
    const plan = buildPlan("");
    expect(plan.renderTable([{ JobID: "7" }], { noColor: true }).split("\n")).toEqual([
      "JobID  State",
      "    7       ",
    ]);
  });

  it("renders only the header when there are no jobs", () => {
    const plan = buildPlan("State%5");
    expect(plan.renderTable([], { noColor: true })).toBe("JobID  State");
  });

  it("keeps widths fixed across renders", () => {
    const plan = buildPlan("");
    plan.renderTable([{ JobID: "1", State: "PD" }], { noColor: true });
    const second = plan.renderTable([{ JobID: "123456", State: "COMPLETED" }], { noColor: true });
    expect(second.split("\n")[1]).toBe("12345  COMPL");
  });

  it("emits bold headers by default", () => {
    const plan = buildPlan("");
    const header = plan.renderTable([]);
    expect(header).toBe("\x1b[1mJobID\x1b[0m  \x1b[1mState\x1b[0m");
  });
});

describe("RenderingPlan.renderJson", () => {
  it("serializes displayed fields in display order", () => {
    const plan = buildPlan("Elapsed");
    const output = plan.renderJson([
      { JobID: "1", State: "COMPLETED", Elapsed: "00:01:00", JobName: "hidden" },
    ]);
    expect(JSON.parse(output)).toEqual([
      { JobID: "1", State: "COMPLETED", Elapsed: "00:01:00" },
    ]);
    expect(Object.keys(JSON.parse(output)[0])).toEqual(["JobID", "State", "Elapsed"]);
  });
});
