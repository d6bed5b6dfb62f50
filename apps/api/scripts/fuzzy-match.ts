/**
 * Fuzzy Matcher for Theological Terms
 *
 * Examples:
 *   npm run fuzzy-match -- source.txt terms.txt
 *   npm run fuzzy-match -- source.txt terms.txt --min-score 75 --output results.json
 *   npm run fuzzy-match -- source.txt terms.txt --limit 5 --format text
 */

import { existsSync, readFileSync, writeFileSync } from "fs";
import {
  USAGE,
  countMatches,
  formatResults,
  matchTerms,
  parseFuzzyMatchArgs,
  readLines,
} from "../src/cli/fuzzyMatch";
import { ValidationError } from "../src/shared/errors/DomainError";
import { toError } from "../src/shared/errors/toError";

function loadLines(label: string, filePath: string): string[] {
  if (!existsSync(filePath)) {
    console.error(`❌ Error: ${label} file '${filePath}' not found.`);
    process.exit(1);
  }
  console.log(`📂 Loading ${label.toLowerCase()} file: ${filePath}`);
  const lines = readLines(readFileSync(filePath, "utf-8"));
  console.log(`   Loaded ${lines.length} entries`);
  return lines;
}

function main(): void {
  const args = process.argv.slice(2);
  if (args.includes("--help") || args.includes("-h")) {
    console.log(USAGE);
    return;
  }

  const options = parseFuzzyMatchArgs(args);
  const texts = loadLines("Source", options.sourceFile);
  const terms = loadLines("Terminology", options.terminologyFile);

  const { tokenSet, tokenSort, partial, ratio } = options.weights;
  console.log(`\n🔍 Processing with minimum score: ${options.minScore}%`);
  console.log(
    `⚖️  Algorithm weights: TokenSet=${tokenSet}, TokenSort=${tokenSort}, Partial=${partial}, Ratio=${ratio}`,
  );

  const results = matchTerms(terms, texts, options);
  console.log(
    `\n📊 Found ${countMatches(results)} total matches for ${Object.keys(results).length} terms`,
  );

  const rendered = formatResults(results, options.format);
  if (options.output) {
    writeFileSync(options.output, `${rendered}\n`, "utf-8");
    console.log(`✅ Results saved to: ${options.output}`);
  } else if (Object.keys(results).length > 0) {
    console.log(`\n${"=".repeat(80)}\n`);
    console.log(rendered);
  } else {
    console.log("\n❌ No matches found above the minimum score threshold.");
  }

  console.log("\n✅ Processing complete!");
}

try {
  main();
} catch (error) {
  if (error instanceof ValidationError) {
    console.error(`❌ ${error.message}\n\n${USAGE}`);
  } else {
    console.error("❌ Fuzzy matching failed:", toError(error).message);
  }
  process.exit(1);
}
