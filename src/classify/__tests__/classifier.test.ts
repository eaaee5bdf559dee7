import assert from "node:assert/strict";
import { test } from "node:test";
import type { Profile, RawRecord } from "../../types.js";
import { resolveFieldMap } from "../../normalize/fields.js";
import { normalizeRecord, normalizeRecords } from "../../normalize/normalizeRecord.js";
import { classifyRecord, partitionRecords } from "../classifier.js";
import { BUILTIN_PROFILES, findProfile } from "../profiles.js";

const fieldMap = resolveFieldMap(["AssetName", "LocationPath", "VendorSeverity", "SubscriptionName"]);
const broker = findProfile(BUILTIN_PROFILES, "broker");
const shopper = findProfile(BUILTIN_PROFILES, "shopper");
const platform = findProfile(BUILTIN_PROFILES, "platform");

const classify = (raw: RawRecord, profile: Profile) => classifyRecord(normalizeRecord(raw, 0, fieldMap), profile);

test("tooling asset with a build-artifact path goes to Dev", () => {
  assert.equal(classify({ AssetName: "BambooAgent1", LocationPath: "/repo/.m2/settings.xml" }, broker), "Dev");
});

test("tooling asset without a build-artifact path goes to SRE", () => {
  assert.equal(classify({ AssetName: "BambooAgent2", LocationPath: "/var/log/agent.log" }, broker), "SRE");
});

test("non-tooling asset falls through to the Database default", () => {
  assert.equal(classify({ AssetName: "OracleDB01", LocationPath: "/u01/app/.m2/x" }, broker), "Database");
});

test("reporting-tool assets share the tooling pool", () => {
  assert.equal(classify({ AssetName: "tableau-prod-1", LocationPath: "/opt/xml-data/extract" }, broker), "Dev");
  assert.equal(classify({ AssetName: "tableau-prod-1", LocationPath: "/opt/tableau/bin" }, broker), "SRE");
});

test("single-level profile splits on location keywords only", () => {
  assert.equal(classify({ AssetName: "OracleDB01", LocationPath: "/usr/lib/node_modules/x" }, shopper), "Dev");
  assert.equal(classify({ AssetName: "BambooAgent2", LocationPath: "/var/log/agent.log" }, shopper), "SRE");
});

test("platform profile routes database assets by subscription tier", () => {
  assert.equal(
    classify({ AssetName: "pg-01", LocationPath: "/var/lib", SubscriptionName: "Platinum-East" }, platform),
    "DB Production"
  );
  assert.equal(classify({ AssetName: "pg-02", LocationPath: "/var/lib", SubscriptionName: "Silver" }, platform), "DB Non-Production");
  assert.equal(classify({ AssetName: "Bamboo-9", LocationPath: "/src/Cargo.lock" }, platform), "Dev Build");
  assert.equal(
    classify({ AssetName: "Bamboo-9", LocationPath: "/etc/ssl", SubscriptionName: "platinum" }, platform),
    "DevOps Tooling"
  );
});

test("partitionRecords keeps every group, including empty ones, in profile order", () => {
  const { records } = normalizeRecords([{ AssetName: "OracleDB01", LocationPath: "", VendorSeverity: "Low" }], fieldMap);
  const partition = partitionRecords(records, broker);
  assert.deepStrictEqual(Array.from(partition.keys()), ["SRE", "Dev", "Database"]);
  assert.deepStrictEqual(
    Array.from(partition.values()).map((group) => group.length),
    [0, 0, 1]
  );
});

test("partition of 100 records yields Dev=25, SRE=15, Database=60", () => {
  const rows: RawRecord[] = [];
  for (let i = 0; i < 25; i += 1) rows.push({ AssetName: `BambooAgent${i}`, LocationPath: `/build/${i}/.m2/repo` });
  for (let i = 0; i < 15; i += 1) rows.push({ AssetName: `bamboo-runner-${i}`, LocationPath: `/var/log/${i}.log` });
  for (let i = 0; i < 60; i += 1) rows.push({ AssetName: `OracleDB${i}`, LocationPath: `/u01/data/${i}` });

  const { records } = normalizeRecords(rows, fieldMap);
  const partition = partitionRecords(records, broker);
  assert.equal(partition.get("Dev")?.length, 25);
  assert.equal(partition.get("SRE")?.length, 15);
  assert.equal(partition.get("Database")?.length, 60);

  const assigned = Array.from(partition.values()).flat();
  assert.equal(assigned.length, 100);
  assert.equal(new Set(assigned.map((record) => record.row)).size, 100);
});

test("classification is repeatable for the same raw record", () => {
  const raw = { AssetName: "BambooAgent1", LocationPath: "/repo/.m2/settings.xml", VendorSeverity: "High" };
  const first = classify(raw, broker);
  const second = classify(raw, broker);
  assert.equal(first, second);
});

test("unvalidated profiles that route outside the universe still keep every record", () => {
  const loose: Profile = {
    ...shopper,
    rules: [{ when: { kind: "contains", field: "location", values: ["npm"] }, group: "Frontend" }]
  };
  const { records } = normalizeRecords([{ AssetName: "a", LocationPath: "/npm/x", VendorSeverity: "Low" }], fieldMap);
  const partition = partitionRecords(records, loose);
  assert.equal(partition.get("Frontend")?.length, 1);
});
