import { promises as fs } from "node:fs";
import path from "node:path";
import type { SimilarityMetric } from "../src/domain/vectorIndex.js";
import { InMemoryVectorIndex } from "../src/infra/store/inMemoryVectorIndex.js";

interface BenchConfig {
  entries: number;
  dimension: number;
  queries: number;
  topK: number;
  metric: SimilarityMetric;
  seed: number;
  saveResults: boolean;
  outputDir: string;
}

interface SummaryMetrics {
  runs: number;
  insertMs: number;
  avgLatencyMs: number;
  p95LatencyMs: number;
  maxLatencyMs: number;
}

interface BenchmarkReport {
  generatedAt: string;
  config: BenchConfig;
  summary: SummaryMetrics;
}

async function main() {
  const config = loadConfig();
  const random = mulberry32(config.seed);

  console.log("Benchmark config");
  console.log("================");
  console.log(JSON.stringify(config, null, 2));
  console.log("");

  const index = new InMemoryVectorIndex<number>({ metric: config.metric });
  const items = Array.from({ length: config.entries }, (_, i) => ({
    vector: randomVector(config.dimension, random),
    payload: i,
  }));

  const insertStartedAt = performance.now();
  index.insertMany(items);
  const insertMs = performance.now() - insertStartedAt;

  const latencies: number[] = [];
  for (let i = 0; i < config.queries; i += 1) {
    const probe = randomVector(config.dimension, random);
    const startedAt = performance.now();
    index.query(probe, config.topK);
    latencies.push(performance.now() - startedAt);
  }

  const summary: SummaryMetrics = {
    runs: latencies.length,
    insertMs,
    avgLatencyMs: average(latencies),
    p95LatencyMs: percentile(latencies, 95),
    maxLatencyMs: Math.max(...latencies),
  };
  printSummary(summary);

  if (config.saveResults) {
    const report: BenchmarkReport = {
      generatedAt: new Date().toISOString(),
      config,
      summary,
    };
    const reportPath = await saveReport(report, config.outputDir);
    console.log(`Saved report: ${reportPath}`);
  }
}

function loadConfig(): BenchConfig {
  const metricRaw = (process.env.BENCH_METRIC ?? "cosine").toLowerCase();
  if (metricRaw !== "cosine" && metricRaw !== "euclidean") {
    throw new Error("BENCH_METRIC must be one of: cosine, euclidean");
  }

  return {
    entries: Math.max(1, Number(process.env.BENCH_ENTRIES ?? "10000")),
    dimension: Math.max(1, Number(process.env.BENCH_DIMENSION ?? "384")),
    queries: Math.max(1, Number(process.env.BENCH_QUERIES ?? "200")),
    topK: Math.max(1, Number(process.env.BENCH_TOP_K ?? "4")),
    metric: metricRaw,
    seed: Number(process.env.BENCH_SEED ?? "42"),
    saveResults: (process.env.BENCH_SAVE ?? "false").toLowerCase() === "true",
    outputDir: process.env.BENCH_OUTPUT_DIR ?? ".benchmarks",
  };
}

function printSummary(summary: SummaryMetrics) {
  console.log("Index query summary");
  console.log("===================");
  console.log(`runs: ${summary.runs}`);
  console.log(`insert_ms: ${summary.insertMs.toFixed(1)}`);
  console.log(`avg_latency_ms: ${summary.avgLatencyMs.toFixed(3)}`);
  console.log(`p95_latency_ms: ${summary.p95LatencyMs.toFixed(3)}`);
  console.log(`max_latency_ms: ${summary.maxLatencyMs.toFixed(3)}`);
  console.log("");
}

async function saveReport(report: BenchmarkReport, outputDir: string): Promise<string> {
  const absoluteDir = path.resolve(outputDir);
  await fs.mkdir(absoluteDir, { recursive: true });

  const stamp = report.generatedAt.replace(/[:.]/g, "-");
  const jsonPath = path.join(absoluteDir, `benchmark-${stamp}.json`);
  await fs.writeFile(jsonPath, JSON.stringify(report, null, 2), "utf-8");
  return jsonPath;
}

function randomVector(dimension: number, random: () => number): number[] {
  return Array.from({ length: dimension }, () => random() * 2 - 1);
}

// Seeded so repeated runs query the same data.
function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function average(values: number[]): number {
  if (values.length === 0) {
    return 0;
  }
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function percentile(values: number[], p: number): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = [...values].sort((a, b) => a - b);
  const rank = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.min(sorted.length - 1, Math.max(0, rank))];
}

main().catch((error) => {
  console.error("Benchmark failed:", error);
  process.exit(1);
});
