#!/usr/bin/env -S npx tsx
import fs from "node:fs/promises";
import path from "node:path";
import { parse } from "./dsl/parser";
import { minify } from "./dsl/minify";
import { generate, outputPath } from "./runtime/generate";
import { GenerateOptionsSchema, type GenerateOptions } from "./runtime/config";
import { RunLogger, readEvents, readSummary } from "./runtime/logger";
import { ToonSerializer, parseFormat } from "./runtime/toon-serializer";
import { encodePng } from "./render/png";

const RUNS_DIR = ".sf-runs";

// ============================================================================
// CLI Argument Parsing
// ============================================================================

function argValue(flag: string): string | null {
  const idx = process.argv.indexOf(flag);
  if (idx === -1) return null;
  const nextArg = process.argv[idx + 1];
  if (!nextArg || nextArg.startsWith("--")) return null;
  return nextArg;
}

function hasFlag(flag: string): boolean {
  return process.argv.includes(flag);
}

function numberArg(flag: string): number | undefined {
  const value = argValue(flag);
  return value === null ? undefined : Number(value);
}

function printUsage(): void {
  console.log(`
shapeforge CLI

Usage:
  shapeforge generate <file> [options]        Render a script to PNG
  shapeforge minify <file> [--out <file>]     Print or write the minified script
  shapeforge dump <file> [--format json|toon] Print the parsed tree
  shapeforge replay <runId>                   Show the timeline of a run

Options:
  --out <file>          Output file (default: <stem>.png)
  --width <n>           Image width in pixels (default: 400)
  --height <n>          Image height in pixels (default: 400)
  --seed <text>         Seed text; omit for a random image
  --count <n>           Number of images; files become <stem>_<i>.png (default: 1)
  --max-depth <n>       Maximum call depth (default: 1500)
  --project <dir>       Project root for run logs (default: cwd)
  --verbose             Enable verbose output

Examples:
  shapeforge generate art/spiral.sf --seed moon --width 800 --height 800
  shapeforge generate art/grid.sf --count 4 --seed grid
  shapeforge minify art/spiral.sf
  shapeforge replay 1234567890-abc123
`);
}

function fail(error: unknown): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[sf] Error: ${message}`);
  process.exit(1);
}

function requireFile(what: string): string {
  const file = process.argv[3];
  if (!file) {
    console.error(`Error: Missing <${what}>`);
    printUsage();
    process.exit(1);
  }
  return file;
}

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const cmd = process.argv[2];

  if (!cmd || cmd === "help" || cmd === "--help" || cmd === "-h") {
    printUsage();
    process.exit(0);
  }

  if (cmd === "minify") {
    await handleMinify();
    return;
  }

  if (cmd === "dump") {
    await handleDump();
    return;
  }

  if (cmd === "replay") {
    await handleReplay();
    return;
  }

  if (cmd !== "generate") {
    console.error(`Unknown command: ${cmd}`);
    printUsage();
    process.exit(1);
  }

  await handleGenerate();
}

async function handleGenerate(): Promise<void> {
  const file = requireFile("file");

  let options: GenerateOptions;
  try {
    options = GenerateOptionsSchema.parse({
      width: numberArg("--width"),
      height: numberArg("--height"),
      count: numberArg("--count"),
      seed: argValue("--seed") ?? undefined,
      maxDepth: numberArg("--max-depth"),
      out: argValue("--out") ?? undefined,
      project: argValue("--project") ?? undefined,
      verbose: hasFlag("--verbose"),
    });
  } catch (error: unknown) {
    fail(error);
  }

  const projectRoot = path.resolve(options.project ?? process.cwd());
  const logger = new RunLogger(path.join(projectRoot, RUNS_DIR));

  if (options.verbose) {
    console.log("[sf] Configuration:");
    console.log(`     Project: ${projectRoot}`);
    console.log(`     Size: ${options.width}x${options.height}`);
    console.log(`     Seed: ${options.seed ?? "random"}`);
    console.log(`     Count: ${options.count}`);
    console.log(`     Max depth: ${options.maxDepth}`);
    console.log("");
  }

  let source: string;
  try {
    source = await fs.readFile(file, "utf8");
    await logger.init({ file, options });
  } catch (error: unknown) {
    fail(error);
  }

  if (options.verbose) {
    console.log(`[sf] Run ID: ${logger.runId}`);
    console.log(`[sf] Logs: ${logger.dir}`);
    console.log("");
  }

  try {
    for (let i = 0; i < options.count; i++) {
      const started = Date.now();
      const seed = options.seed === undefined || options.count === 1 ? options.seed : `${options.seed}:${i}`;
      const { pixmap } = await generate(source, {
        width: options.width,
        height: options.height,
        seed,
        vm: { maxDepth: options.maxDepth },
        logger,
        file,
      });

      const out = outputPath(file, options.out, i, options.count);
      const dir = path.dirname(out);
      if (dir !== ".") await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(out, encodePng(pixmap));

      const ms = Date.now() - started;
      await logger.append({ type: "output", file: out, ms });
      console.log(`[sf] Output to ${out} in ${ms}ms`);
    }

    await logger.finalize();
    if (options.verbose) console.log(`[sf] Reduction: ${logger.tracker.getSummary()}`);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    try {
      await logger.append({ type: "error", error: message });
      await logger.finalize();
      console.error(`[sf] Logs: ${logger.dir}`);
    } catch (logError: unknown) {
      console.error(`[sf] Could not write run log: ${String(logError)}`);
    }
    fail(error);
  }
}

async function handleMinify(): Promise<void> {
  const inputFile = requireFile("file");
  const outputFile = argValue("--out");

  try {
    const source = await fs.readFile(inputFile, "utf8");
    const minified = minify(source);

    if (outputFile) {
      await fs.mkdir(path.dirname(outputFile), { recursive: true });
      await fs.writeFile(outputFile, minified + "\n", "utf8");
      console.log(`[sf] Minified: ${inputFile} → ${outputFile}`);
    } else {
      console.log(minified);
    }
  } catch (error: unknown) {
    fail(error);
  }
}

async function handleDump(): Promise<void> {
  const inputFile = requireFile("file");

  try {
    const format = parseFormat(argValue("--format") ?? undefined);
    const tree = parse(await fs.readFile(inputFile, "utf8"));
    console.log(ToonSerializer.serialize(tree, { format, pretty: true }));
  } catch (error: unknown) {
    fail(error);
  }
}

async function handleReplay(): Promise<void> {
  const runId = requireFile("runId");
  const projectRoot = path.resolve(argValue("--project") ?? process.cwd());
  const runsDir = path.join(projectRoot, RUNS_DIR);

  try {
    const events = await readEvents(runsDir, runId);
    const summary = await readSummary(runsDir, runId);

    console.log(`\n=== Replay: ${runId} ===\n`);

    if (summary) {
      console.log(`Finished: ${summary.finishedAt}`);
      console.log(`Events: ${summary.eventCount}`);
      console.log(`Calls: ${summary.reduction.calls} (max depth ${summary.reduction.maxDepth})`);
      console.log("");
    }

    console.log("Timeline:\n");

    for (const event of events) {
      switch (event.type) {
        case "parse":
          console.log(`[${event.step}] PARSE ${event.file}: ${event.definitions} definitions`);
          break;
        case "reduce":
          console.log(`[${event.step}] REDUCE seed=${event.seed}`);
          console.log(`  Cache: ${event.stats.cache.hits} hits, ${event.stats.cache.misses} misses`);
          break;
        case "render":
          console.log(`[${event.step}] RENDER ${event.width}x${event.height}`);
          break;
        case "output":
          console.log(`[${event.step}] OUTPUT ${event.file} (${event.ms}ms)`);
          break;
        case "error":
          console.log(`[${event.step}] ERROR: ${event.error}`);
          break;
      }
    }

    console.log(`\n=== End Replay ===\n`);
    console.log(`Full logs: ${path.join(runsDir, runId)}`);
  } catch (error: unknown) {
    fail(error);
  }
}

await main();
