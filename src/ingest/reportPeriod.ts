import path from "node:path";
import type { ReportPeriod } from "../types.js";

const MONTH_PATTERN =
  /(?<![a-z])(jan(?:uary)?|feb(?:ruary)?|mar(?:ch)?|apr(?:il)?|may|june?|july?|aug(?:ust)?|sep(?:t(?:ember)?)?|oct(?:ober)?|nov(?:ember)?|dec(?:ember)?)(?![a-z])/i;

const TIMESTAMP_PATTERN = /(\d{4}_\d{2}_\d{2})T(\d{2}_\d{2}_\d{2})Z/;

/**
 * Reads the reporting month and export timestamp that scanners embed in
 * their file names, e.g. `vulns_Oct_2025_09_24T05_22_34Z.csv`.
 */
export function extractReportPeriod(fileName: string): ReportPeriod {
  const base = path.basename(fileName);
  const monthMatch = MONTH_PATTERN.exec(base)?.[1];
  const month = monthMatch ? `${monthMatch.charAt(0).toUpperCase()}${monthMatch.slice(1, 3).toLowerCase()}` : null;
  const stamp = TIMESTAMP_PATTERN.exec(base);
  const timestamp = stamp ? `${stamp[1]}_${stamp[2]}` : null;
  const suffix = [month, timestamp]
    .filter((part): part is string => Boolean(part))
    .map((part) => `_${part}`)
    .join("");
  return { month, timestamp, suffix };
}
