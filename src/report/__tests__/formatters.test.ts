import assert from "node:assert/strict";
import { test } from "node:test";
import type { SummaryMatrix } from "../../types.js";
import { formatDiagnostic, renderMatrixTable, summaryMatrixToCsvRows } from "../formatters.js";

const matrix: SummaryMatrix = {
  profileId: "shopper",
  columns: [
    { kind: "total", label: "Total" },
    { kind: "group", label: "SRE", group: "SRE" },
    { kind: "exploit", label: "SRE Exploit", group: "SRE" },
    { kind: "group", label: "Dev", group: "Dev" }
  ],
  rows: [
    { kind: "severity", label: "Critical", cells: [1200, 1000, 3, 200] },
    { kind: "severity", label: "None", cells: [0, 0, null, 0] },
    { kind: "total", label: "Total", cells: [1200, 1000, null, 200] }
  ]
};

test("renderMatrixTable aligns labels left and counts right", () => {
  assert.deepStrictEqual(renderMatrixTable(matrix), [
    "Severity | Total |   SRE | SRE Exploit | Dev",
    "---------+-------+-------+-------------+----",
    "Critical | 1,200 | 1,000 |           3 | 200",
    "None     |     0 |     0 |             |   0",
    "---------+-------+-------+-------------+----",
    "Total    | 1,200 | 1,000 |             | 200"
  ]);
});

test("summaryMatrixToCsvRows keeps raw numbers and blanks empty exploit cells", () => {
  assert.deepStrictEqual(summaryMatrixToCsvRows(matrix), [
    ["Severity", "Total", "SRE", "SRE Exploit", "Dev"],
    ["Critical", "1200", "1000", "3", "200"],
    ["None", "0", "0", "", "0"],
    ["Total", "1200", "1000", "", "200"]
  ]);
});

test("formatDiagnostic describes unrecognized severities", () => {
  assert.equal(
    formatDiagnostic({ kind: "unrecognized_severity", value: "p1", label: "P1", rows: [4] }),
    'Unrecognized severity "p1" counted as "P1" (1 row)'
  );
});

test("formatDiagnostic describes rule overlaps with their pool path", () => {
  assert.equal(
    formatDiagnostic({ kind: "rule_overlap", path: [], ruleIndexes: [0, 1], groups: ["tooling pool", "DB Production"], rows: [1, 2] }),
    "Rules 0, 1 overlap at top-level: tooling pool vs DB Production (2 rows, first rule wins)"
  );
  assert.equal(
    formatDiagnostic({ kind: "rule_overlap", path: ["ci"], ruleIndexes: [0, 1], groups: ["Java", "Node"], rows: [0] }),
    "Rules 0, 1 overlap at ci pool: Java vs Node (1 row, first rule wins)"
  );
});
