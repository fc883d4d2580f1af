#!/usr/bin/env node
/**
 * Operator CLI for the curation workflow.
 *
 * Usage:
 *   npx tsx src/cli/curate.ts <command> [args] [options]
 *   npm run curate -- <command> [args] [options]
 *
 * Commands:
 *   search <term...>        Search PubMed, cache eligible records, list them by readability
 *   generate <pmid>         Generate a draft story for a record
 *   review <pmid>           Show an artifact with its snapshots
 *   publish <pmid>          Publish an artifact (at --rank, default: end of gallery)
 *   unpublish <pmid>        Withdraw a published artifact
 *   reorder <pmid> <rank>   Move a published artifact
 *   gallery                 List published artifacts in rank order
 *   drafts                  List every artifact, published first
 *
 * Options:
 *   --retmax <n>       Results requested from PubMed (search)
 *   --rank <n>         Featured rank (publish)
 *   --overwrite        Replace an existing unpublished draft (generate)
 *   --term <text>      Search term to record as provenance (generate)
 *   --json             Print results as JSON
 *   -h, --help         Show help
 *
 * Exit codes:
 *   0 - Command succeeded
 *   1 - Command failed
 */

import { parseArgs } from "node:util";

import type { Artifact } from "../artifacts/schema.js";
import { ConfigError, loadConfig, requirePubMedEmail } from "../config/index.js";
import type { SearchOutcome } from "../curation/index.js";
import { CurationError } from "../errors.js";
import { initRunId } from "../logging/index.js";
import { createNewsroom, type Newsroom } from "../newsroom.js";
import { PromptLoadError } from "../prompts/index.js";

// ============================================================
// CLI Parsing
// ============================================================

const HELP = `
Usage: curate <command> [args] [options]

Commands:
  search <term...>        Search PubMed and list eligible records by readability
  generate <pmid>         Generate a draft story for a record
  review <pmid>           Show an artifact with its snapshots
  publish <pmid>          Publish an artifact (at --rank, default: end of gallery)
  unpublish <pmid>        Withdraw a published artifact
  reorder <pmid> <rank>   Move a published artifact
  gallery                 List published artifacts in rank order
  drafts                  List every artifact, published first

Options:
  --retmax <n>       Results requested from PubMed (search)
  --rank <n>         Featured rank (publish)
  --overwrite        Replace an existing unpublished draft (generate)
  --term <text>      Search term to record as provenance (generate)
  --json             Print results as JSON
  -h, --help         Show this help message
`;

function parseCliArgs() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      retmax: { type: "string" },
      rank: { type: "string" },
      overwrite: { type: "boolean", default: false },
      term: { type: "string" },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help || positionals.length === 0) {
    console.log(HELP);
    process.exit(values.help ? 0 : 1);
  }

  const [command = "", ...args] = positionals;
  return { command, args, values };
}

class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

function requireArg(args: readonly string[], index: number, name: string): string {
  const value = args[index];
  if (value === undefined || value.trim() === "") {
    throw new UsageError(`Missing <${name}>`);
  }
  return value.trim();
}

function parseInteger(value: string | undefined, name: string): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new UsageError(`${name} must be an integer, got: ${value}`);
  }
  return parsed;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printSearch(outcome: SearchOutcome): void {
  console.log("");
  console.log(c("bold", `Search "${outcome.query.term}" (query #${outcome.query.id})`));
  console.log("─".repeat(60));
  for (const result of outcome.results) {
    const status = result.isPublished
      ? c("green", "published")
      : result.hasArtifact
        ? c("yellow", "draft")
        : c("dim", "new");
    const score = result.score === null ? "n/a" : result.score.toFixed(3);
    console.log(
      `${score.padStart(7)}  ${result.record.pmid.padEnd(10)} ${status}  ${result.record.title}`
    );
  }
  if (outcome.skipped.length > 0) {
    console.log(c("dim", `\n${outcome.skipped.length} result(s) skipped:`));
    for (const item of outcome.skipped) {
      const detail = item.missingFields.length > 0 ? ` (${item.missingFields.join(", ")})` : "";
      console.log(c("dim", `  • ${item.id || "?"} ${item.reason}${detail}`));
    }
  }
  console.log("");
}

function printArtifact(artifact: Artifact): void {
  const rank = artifact.featuredRank === null ? c("dim", "draft") : c("green", `#${artifact.featuredRank}`);
  console.log("");
  console.log(`${rank} ${c("bold", artifact.headline)}`);
  console.log(c("dim", `PMID ${artifact.pmid} · ${artifact.metadataSnapshot.journal} ${artifact.metadataSnapshot.year}`));
  if (artifact.standfirst) {
    console.log(`\n${artifact.standfirst}`);
  }
  for (const paragraph of artifact.story.paragraphs) {
    console.log(`\n${paragraph}`);
  }
  if (artifact.story.whatHappensNext) {
    console.log(`\n${c("bold", "What happens next:")} ${artifact.story.whatHappensNext}`);
  }
  console.log("");
}

function printList(items: readonly Artifact[]): void {
  if (items.length === 0) {
    console.log(c("dim", "No artifacts."));
    return;
  }
  for (const artifact of items) {
    const rank = artifact.featuredRank === null ? "  -" : String(artifact.featuredRank).padStart(3);
    console.log(`${rank}  ${artifact.pmid.padEnd(10)} ${artifact.headline}`);
  }
}

function emit<T>(json: boolean, value: T, print: (value: T) => void): void {
  if (json) {
    console.log(JSON.stringify(value, null, 2));
  } else {
    print(value);
  }
}

// ============================================================
// Commands
// ============================================================

type CliArgs = ReturnType<typeof parseCliArgs>;

async function run(newsroom: Newsroom, { command, args, values }: CliArgs): Promise<void> {
  const { workflow } = newsroom;
  const json = values.json === true;

  switch (command) {
    case "search": {
      const term = args.join(" ");
      if (!term.trim()) {
        throw new UsageError("Missing <term>");
      }
      const outcome = await workflow.search(term, { retmax: parseInteger(values.retmax, "--retmax") });
      emit(json, outcome, printSearch);
      return;
    }
    case "generate": {
      const artifact = await workflow.generate(requireArg(args, 0, "pmid"), {
        overwrite: values.overwrite === true,
        searchTerm: values.term,
      });
      emit(json, artifact, printArtifact);
      return;
    }
    case "review": {
      const view = workflow.review(requireArg(args, 0, "pmid"));
      emit(json, view, (v) => printArtifact(v.artifact));
      return;
    }
    case "publish": {
      const artifact = workflow.publish(requireArg(args, 0, "pmid"), parseInteger(values.rank, "--rank"));
      emit(json, artifact, (a) => console.log(c("green", `✓ Published ${a.pmid} at rank ${a.featuredRank}`)));
      return;
    }
    case "unpublish": {
      const artifact = workflow.unpublish(requireArg(args, 0, "pmid"));
      emit(json, artifact, (a) => console.log(c("green", `✓ Unpublished ${a.pmid}`)));
      return;
    }
    case "reorder": {
      const rank = parseInteger(requireArg(args, 1, "rank"), "rank") ?? 0;
      const artifact = workflow.reorder(requireArg(args, 0, "pmid"), rank);
      emit(json, artifact, (a) => console.log(c("green", `✓ Moved ${a.pmid} to rank ${a.featuredRank}`)));
      return;
    }
    case "gallery":
      emit(json, workflow.gallery(), printList);
      return;
    case "drafts":
      emit(json, workflow.artifacts(), printList);
      return;
    default:
      throw new UsageError(`Unknown command "${command}"`);
  }
}

// ============================================================
// Main
// ============================================================

const NETWORK_COMMANDS = new Set(["search", "generate"]);

async function main(): Promise<void> {
  const cli = parseCliArgs();
  initRunId();

  let newsroom: Newsroom | undefined;
  try {
    const config = loadConfig();
    if (NETWORK_COMMANDS.has(cli.command)) {
      requirePubMedEmail(config);
    }
    newsroom = createNewsroom(config);
    await run(newsroom, cli);
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(c("red", err.format()));
    } else if (err instanceof CurationError) {
      newsroom?.logger.error(err.message, { code: err.code, error: err });
      console.error(c("red", `✗ ${err.userMessage()}`));
    } else if (err instanceof UsageError || err instanceof PromptLoadError) {
      console.error(c("red", `✗ ${err.message}`));
      if (err instanceof UsageError) {
        console.error(HELP);
      }
    } else {
      throw err;
    }
    process.exitCode = 1;
  } finally {
    newsroom?.close();
  }
}

main().catch((err) => {
  console.error("Unexpected error:", err);
  process.exit(1);
});
