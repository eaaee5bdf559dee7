import assert from "node:assert/strict";
import { test } from "node:test";
import { extractReportPeriod } from "../reportPeriod.js";

test("extracts month and export timestamp from scanner file names", () => {
  assert.deepStrictEqual(extractReportPeriod("/data/vulns_Oct_2025_09_24T05_22_34Z.csv"), {
    month: "Oct",
    timestamp: "2025_09_24_05_22_34",
    suffix: "_Oct_2025_09_24_05_22_34"
  });
});

test("normalizes long and upper-case month names to three letters", () => {
  assert.equal(extractReportPeriod("Findings-September.json").month, "Sep");
  assert.equal(extractReportPeriod("DECEMBER report.csv").month, "Dec");
});

test("month names must stand alone", () => {
  assert.deepStrictEqual(extractReportPeriod("summary.csv"), { month: null, timestamp: null, suffix: "" });
  assert.equal(extractReportPeriod("mayhem.csv").month, null);
});

test("timestamp without a month still yields a suffix", () => {
  assert.deepStrictEqual(extractReportPeriod("export_2025_01_02T03_04_05Z.csv"), {
    month: null,
    timestamp: "2025_01_02_03_04_05",
    suffix: "_2025_01_02_03_04_05"
  });
});
