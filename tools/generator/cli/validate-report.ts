#!/usr/bin/env node
import { validateReportFile } from "../lib/validation.js";

function main(): void {
  const files = process.argv.slice(2);
  if (files.length === 0) {
    console.error("Usage: validate-report <report.json> [more.json ...]");
    process.exit(1);
  }

  const issues = files.flatMap((file) => validateReportFile(file));
  const failed = new Set(issues.map((issue) => issue.file));

  for (const file of files) {
    if (!failed.has(file)) {
      console.log(`OK   ${file}`);
    }
  }

  if (issues.length > 0) {
    for (const issue of issues) {
      console.error(`FAIL ${issue.file}`);
      for (const message of issue.messages) {
        console.error(`  ${message}`);
      }
    }
    console.error("\nValidation failed.");
    process.exit(1);
  }

  console.log("\nAll reports valid.");
}

main();
