import path from "node:path";

import {
  findWordListFiles,
  validateWordListFile,
  type WordListValidation,
} from "./enrichment/validate-wordlist";
import { logError } from "./enrichment/logger";

const DEFAULT_WORDLIST_DIR = path.resolve(process.cwd(), "data", "wordlists");
const MAX_REPORTED_ISSUES = 20;

function printReport(result: WordListValidation): void {
  const rule = "=".repeat(60);
  console.log(`\n${rule}`);
  console.log(`Validation Report: ${result.filePath}`);
  console.log(rule);
  console.log(`Total words: ${result.totalWords}`);
  console.log(`Unique words: ${result.uniqueWords}`);
  console.log(`Duplicates: ${result.duplicateCount}`);
  console.log(`Issues found: ${result.issues.length}`);

  if (result.issues.length) {
    console.log("\nIssues:");
    for (const issue of result.issues.slice(0, MAX_REPORTED_ISSUES)) {
      console.log(`  - ${issue}`);
    }
    if (result.issues.length > MAX_REPORTED_ISSUES) {
      console.log(`  ... and ${result.issues.length - MAX_REPORTED_ISSUES} more issues`);
    }
  } else {
    console.log("\n[OK] All checks passed!");
  }
}

async function main() {
  const [target, directory] = process.argv.slice(2);
  if (!target) {
    console.error("Usage: validate-wordlist <path/to/wordlist.json> | --all [directory]");
    process.exitCode = 1;
    return;
  }

  const files = target === "--all"
    ? await findWordListFiles(directory ? path.resolve(directory) : DEFAULT_WORDLIST_DIR)
    : [path.resolve(target)];

  const results: WordListValidation[] = [];
  for (const file of files) {
    const result = await validateWordListFile(file);
    printReport(result);
    results.push(result);
  }

  if (files.length > 1) {
    console.log("\nSummary:");
    for (const result of results) {
      const status = result.valid ? "[OK]" : "[FAIL]";
      console.log(`${status} ${path.basename(result.filePath)}: ${result.totalWords} words, ${result.issues.length} issues`);
    }
  }

  if (!results.every((result) => result.valid)) {
    process.exitCode = 1;
  }
}

main().catch((error) => {
  console.error("Word list validation failed.");
  logError(error);
  process.exitCode = 1;
});
