/**
 * Report output: console summary + full JSON artifact on disk.
 */

import fs from "fs";
import path from "path";
import type { ResearchReport } from "./types.js";

function preview(text: string, max: number): string {
  return `${text.slice(0, max)}...`;
}

export function formatResearchSummary(report: ResearchReport): string {
  const bar = "=".repeat(50);
  const rule = "-".repeat(50);
  const lines: string[] = ["", bar, "MARKET RESEARCH REPORT SUMMARY", bar];

  const first = report.iterations[0];
  if (first) lines.push("", `Initial query: ${preview(first.query, 150)}`);

  if (report.metadata) {
    lines.push("", `Processing Time: ${report.metadata.processing_time_sec} seconds`);
  }

  lines.push("", "★ Key Findings ★", rule, preview(report.final_analysis, 2000));

  lines.push("", "", "★ Research Process ★", rule);
  for (const it of report.iterations) {
    lines.push("", `Iteration ${it.iteration}:`);
    lines.push(`Query: ${preview(it.query, 150)}`);
    lines.push(`Sources Found: ${it.sources_found}`);

    if (it.knowledge_gaps.length > 0) {
      lines.push("", "Identified Gaps:");
      for (const gap of it.knowledge_gaps) {
        lines.push(`  - ${preview(gap, 100)}`);
      }
    }
  }

  lines.push("", `Total Sources Analyzed: ${report.all_sources.length}`, "", bar);
  return lines.join("\n");
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function reportFilename(now: Date = new Date()): string {
  const date = `${now.getFullYear()}${pad(now.getMonth() + 1)}${pad(now.getDate())}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;
  return `market_research_${date}_${time}.json`;
}

/** Returns the path written. */
export function saveFullReport(
  report: ResearchReport,
  filename: string = reportFilename(),
  dir: string = process.cwd()
): string {
  const filePath = path.join(dir, filename);
  fs.mkdirSync(dir, { recursive: true });
  fs.writeFileSync(filePath, JSON.stringify(report, null, 2), "utf-8");
  return filePath;
}
