import type { StoredObservation } from "../types/ranking.js";

export interface HistorySection {
  keyword: string;
  domain: string;
  records: StoredObservation[];
}

const RULE = "=".repeat(80);
const THIN_RULE = "-".repeat(80);

function formatRecord(record: StoredObservation, index: number): string {
  const prefix = `  ${index + 1}. [${record.timestamp}]`;
  if (record.found) {
    return `${prefix} Position: ${record.position} | ${record.link}`;
  }
  return `${prefix} Not found in results`;
}

export function buildHistoryReport(sections: HistorySection[]): string {
  const lines = ["", RULE, "RANKING HISTORY", RULE];

  for (const section of sections) {
    lines.push("", `Keyword: '${section.keyword}' | Domain: '${section.domain}'`, THIN_RULE);
    if (section.records.length === 0) {
      lines.push("  No data available");
      continue;
    }
    section.records.forEach((record, index) => lines.push(formatRecord(record, index)));
  }

  lines.push("", RULE, "");
  return lines.join("\n");
}
