#!/usr/bin/env node
import dotenv from "dotenv";
dotenv.config({ override: true });

import inquirer from "inquirer";
import {
  conductMarketResearch,
  requestFromAnswers,
  DEFAULT_API_URL,
  DEFAULT_TIMEOUT_MS,
  type CliAnswers,
} from "./client.js";
import { errorMessage } from "./errors.js";
import { formatResearchSummary, saveFullReport } from "./report.js";

async function main() {
  console.log("🚀 Iterative Market Research (CLI)\n");

  const answers = await inquirer.prompt<CliAnswers>([
    {
      type: "input",
      name: "domain",
      message: "Domain to research",
      validate: (input: string) => (input.trim() ? true : "Domain is required"),
    },
    { type: "input", name: "companyName", message: "Company name (optional)" },
    { type: "input", name: "metrics", message: "Metrics, comma-separated (optional)" },
    { type: "input", name: "customOperator", message: "Analysis method, e.g. SWOT (optional)" },
  ]);

  const request = requestFromAnswers(answers);
  console.log(`\n🔍 Starting research on: ${request.domain}`);
  if (request.companyName) console.log(`🏢 Focusing on company: ${request.companyName}`);

  try {
    const report = await conductMarketResearch(request, {
      apiUrl: process.env.RESEARCH_API_URL || DEFAULT_API_URL,
      timeoutMs: parseInt(process.env.RESEARCH_TIMEOUT_MS || String(DEFAULT_TIMEOUT_MS)),
    });

    console.log(formatResearchSummary(report));
    const filePath = saveFullReport(report, undefined, process.env.REPORT_DIR || process.cwd());
    console.log(`\n💾 Full report saved to: ${filePath}`);
  } catch (error) {
    console.error("\n❌ Research failed:");
    console.error(`Error: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error(error);
  process.exitCode = 1;
});
