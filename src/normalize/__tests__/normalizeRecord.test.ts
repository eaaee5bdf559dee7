import assert from "node:assert/strict";
import { test } from "node:test";
import { resolveFieldMap } from "../fields.js";
import { computeAgeDays, isExploitKnown, normalizeRecord, normalizeRecords } from "../normalizeRecord.js";

const NOW = new Date("2025-10-15T00:00:00Z");

const fieldMap = resolveFieldMap([
  "AssetName",
  "LocationPath",
  "VendorSeverity",
  "SubscriptionName",
  "HasExploit",
  "FirstDetected",
  "ResolvedAt",
  "FindingStatus"
]);

test("normalizeRecord lower-cases match fields and fills missing values", () => {
  const raw = { AssetName: "  BambooAgent1 ", LocationPath: "/Repo/.M2/settings.xml", VendorSeverity: "High" };
  const record = normalizeRecord(raw, 3, fieldMap, { now: NOW });
  assert.equal(record.row, 3);
  assert.equal(record.asset, "bambooagent1");
  assert.equal(record.location, "/repo/.m2/settings.xml");
  assert.equal(record.tier, "");
  assert.equal(record.severity, "High");
  assert.equal(record.severityLabel, "High");
  assert.equal(record.exploitKnown, false);
  assert.equal(record.ageDays, null);
  assert.equal(record.raw, raw);
});

test("normalizeRecord maps a missing severity to None", () => {
  const record = normalizeRecord({ AssetName: "OracleDB01", LocationPath: null }, 0, fieldMap);
  assert.equal(record.severity, "None");
  assert.equal(record.location, "");
});

test("isExploitKnown accepts yes/true in any case", () => {
  assert.equal(isExploitKnown("Yes"), true);
  assert.equal(isExploitKnown(" TRUE "), true);
  assert.equal(isExploitKnown(true), true);
  assert.equal(isExploitKnown("no"), false);
  assert.equal(isExploitKnown("1"), false);
  assert.equal(isExploitKnown(undefined), false);
});

test("computeAgeDays counts open findings up to now", () => {
  assert.equal(computeAgeDays("2025-10-01T00:00:00Z", "", "Open", NOW), 14);
});

test("computeAgeDays stops at the resolution date for resolved findings", () => {
  assert.equal(computeAgeDays("2025-10-01T00:00:00Z", "2025-10-05T12:00:00Z", "resolved", NOW), 4);
});

test("computeAgeDays ignores the resolution date while the finding is open", () => {
  assert.equal(computeAgeDays("2025-10-01T00:00:00Z", "2025-10-05T12:00:00Z", "In Progress", NOW), 14);
});

test("computeAgeDays falls back to now when the resolution date is unparsable", () => {
  assert.equal(computeAgeDays("2025-10-01T00:00:00Z", "not a date", "Resolved", NOW), 14);
});

test("computeAgeDays clamps negative ages and rejects bad detection dates", () => {
  assert.equal(computeAgeDays("2025-11-01T00:00:00Z", null, "Open", NOW), 0);
  assert.equal(computeAgeDays("", null, "Open", NOW), null);
  assert.equal(computeAgeDays("yesterday", null, "Open", NOW), null);
});

test("normalizeRecords reports unrecognized severities once per distinct value", () => {
  const rows = [
    { AssetName: "a", LocationPath: "/x", VendorSeverity: "P1" },
    { AssetName: "b", LocationPath: "/y", VendorSeverity: "critical" },
    { AssetName: "c", LocationPath: "/z", VendorSeverity: "P1" },
    { AssetName: "d", LocationPath: "/w", VendorSeverity: "urgent" }
  ];
  const { records, diagnostics } = normalizeRecords(rows, fieldMap, { now: NOW });
  assert.deepStrictEqual(
    records.map((record) => record.severity),
    [null, "Critical", null, null]
  );
  assert.deepStrictEqual(diagnostics, [
    { kind: "unrecognized_severity", value: "P1", label: "P1", rows: [0, 2] },
    { kind: "unrecognized_severity", value: "urgent", label: "Urgent", rows: [3] }
  ]);
});

test("normalizeRecords folds unrecognized severities into None when the policy says so", () => {
  const rows = [{ AssetName: "a", LocationPath: "/x", VendorSeverity: "urgent" }];
  const { records, diagnostics } = normalizeRecords(rows, fieldMap, {
    severity: { match: "contains", unrecognized: "fold" }
  });
  assert.equal(records[0]?.severity, "None");
  assert.equal(records[0]?.severityLabel, "Urgent");
  assert.equal(diagnostics.length, 1);
});
