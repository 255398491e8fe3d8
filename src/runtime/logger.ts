import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { CacheStats } from "./cache";

// ============================================================================
// Event Types
// ============================================================================

const CacheStatsSchema = z.object({
  hits: z.number(),
  misses: z.number(),
  entries: z.number(),
  draws: z.number(),
});

export const ReductionSnapshotSchema = z.object({
  calls: z.number(),
  builtinCalls: z.number(),
  maxDepth: z.number(),
  cache: CacheStatsSchema,
  elapsedMs: z.number(),
});

export type ReductionSnapshot = z.infer<typeof ReductionSnapshotSchema>;

const EventBase = z.object({ step: z.number().int(), ts: z.string() });

export const RunEventSchema = z.discriminatedUnion("type", [
  EventBase.extend({ type: z.literal("parse"), file: z.string(), definitions: z.number().int() }),
  EventBase.extend({ type: z.literal("reduce"), seed: z.string(), stats: ReductionSnapshotSchema }),
  EventBase.extend({ type: z.literal("render"), width: z.number().int(), height: z.number().int() }),
  EventBase.extend({ type: z.literal("output"), file: z.string(), ms: z.number() }),
  EventBase.extend({ type: z.literal("error"), error: z.string() }),
]);

export type RunEvent = z.infer<typeof RunEventSchema>;

/** Distributes `Omit` over the event union so each variant keeps its own fields. */
export type RunEventInput = RunEvent extends infer E
  ? E extends RunEvent
    ? Omit<E, "step" | "ts">
    : never
  : never;

export const RunSummarySchema = z.object({
  runId: z.string(),
  finishedAt: z.string(),
  reduction: ReductionSnapshotSchema,
  eventCount: z.number().int(),
});

export type RunSummary = z.infer<typeof RunSummarySchema>;

// ============================================================================
// Reduction Tracking
// ============================================================================

const EMPTY_CACHE_STATS: CacheStats = { hits: 0, misses: 0, entries: 0, draws: 0 };

export class ReductionTracker {
  private calls = 0;
  private builtinCalls = 0;
  private maxDepth = 0;
  private cache: CacheStats = { ...EMPTY_CACHE_STATS };
  private startTime = Date.now();

  incrementCall(depth: number): void {
    this.calls++;
    if (depth > this.maxDepth) this.maxDepth = depth;
  }

  incrementBuiltinCall(): void {
    this.builtinCalls++;
  }

  /** Adds the counters of one finished reduction. */
  recordCache(stats: CacheStats): void {
    this.cache = {
      hits: this.cache.hits + stats.hits,
      misses: this.cache.misses + stats.misses,
      entries: this.cache.entries + stats.entries,
      draws: this.cache.draws + stats.draws,
    };
  }

  getSnapshot(): ReductionSnapshot {
    return {
      calls: this.calls,
      builtinCalls: this.builtinCalls,
      maxDepth: this.maxDepth,
      cache: { ...this.cache },
      elapsedMs: Date.now() - this.startTime,
    };
  }

  getSummary(): string {
    const s = this.getSnapshot();
    return [
      `Calls: ${s.calls} (+${s.builtinCalls} builtin)`,
      `Depth: ${s.maxDepth}`,
      `Cache: ${s.cache.hits} hits / ${s.cache.misses} misses`,
      `Draws: ${s.cache.draws}`,
      `Time: ${(s.elapsedMs / 1000).toFixed(2)}s`,
    ].join(" | ");
  }
}

// ============================================================================
// Run Logger
// ============================================================================

export class RunLogger {
  runId: string;
  dir: string;
  file: string;
  tracker: ReductionTracker;
  private eventCount: number = 0;

  constructor(readonly baseDir: string) {
    this.runId = `${Date.now()}-${Math.random().toString(16).slice(2)}`;
    this.dir = path.join(baseDir, this.runId);
    this.file = path.join(this.dir, "events.jsonl");
    this.tracker = new ReductionTracker();
  }

  async init(meta: Record<string, unknown> = {}): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    await fs.writeFile(this.file, "", "utf8");

    const data = {
      runId: this.runId,
      startedAt: new Date().toISOString(),
      pid: process.pid,
      cwd: process.cwd(),
      ...meta,
    };
    await fs.writeFile(path.join(this.dir, "meta.json"), JSON.stringify(data, null, 2), "utf8");
  }

  async append(ev: RunEventInput): Promise<RunEvent> {
    this.eventCount++;
    const event = RunEventSchema.parse({ ...ev, step: this.eventCount, ts: new Date().toISOString() });
    await fs.appendFile(this.file, JSON.stringify(event) + "\n", "utf8");
    return event;
  }

  async finalize(): Promise<void> {
    const summary: RunSummary = {
      runId: this.runId,
      finishedAt: new Date().toISOString(),
      reduction: this.tracker.getSnapshot(),
      eventCount: this.eventCount,
    };
    await fs.writeFile(path.join(this.dir, "summary.json"), JSON.stringify(summary, null, 2), "utf8");
  }
}

// ============================================================================
// Replay
// ============================================================================

/** Reads back the events of a run, in order. */
export async function readEvents(baseDir: string, runId: string): Promise<RunEvent[]> {
  const text = await fs.readFile(path.join(baseDir, runId, "events.jsonl"), "utf8");
  return text
    .split("\n")
    .filter((line) => line.trim())
    .map((line) => RunEventSchema.parse(JSON.parse(line)));
}

/** The run summary, or null while the run has not finished. */
export async function readSummary(baseDir: string, runId: string): Promise<RunSummary | null> {
  const file = path.join(baseDir, runId, "summary.json");
  let text: string;
  try {
    text = await fs.readFile(file, "utf8");
  } catch (e: unknown) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }
  return RunSummarySchema.parse(JSON.parse(text));
}
