import path from "path";
import { AuditConfig } from "../config/auditConfig";
import { buildRunManifest, writeRunManifest } from "../io/runManifest";
import { readSnapshot } from "../io/snapshot";
import { formatSummary, summarizeTree } from "../report/summary";
import { RelationTree } from "../types/relationTree";
import { RunManifest } from "../types/runManifest";
import { nowUtcIsoFileSafe, nowUtcIsoSeconds } from "../utils/time";
import { AuditDeps, emptyArtifacts, finishAudit } from "./audit";

export interface BackfillRunOptions {
  config: AuditConfig;
  configPath: string;
  snapshotPath: string;
  outDir: string;
  runId?: string;
}

export async function runBackfill(deps: AuditDeps, options: BackfillRunOptions): Promise<RunManifest> {
  const outDir = path.resolve(options.outDir);
  const snapshotPath = path.resolve(options.snapshotPath);
  const runId = options.runId ?? nowUtcIsoFileSafe();
  const startedAt = nowUtcIsoSeconds();
  const artifacts = emptyArtifacts();

  let tree: RelationTree | null = null;
  let failure: unknown;
  try {
    const built = await readSnapshot(snapshotPath);
    console.log(`Loaded ${built.size} discover executions from ${snapshotPath}`);
    tree = await finishAudit(built, deps, options.config, outDir, runId, artifacts);
  } catch (error) {
    failure = error;
  }

  const summary = tree ? summarizeTree(tree) : null;
  if (summary) console.log(formatSummary(summary));

  const manifest = buildRunManifest({
    runId,
    mode: "backfill",
    outDir,
    configPath: path.resolve(options.configPath),
    sourceSnapshot: snapshotPath,
    startedAt,
    endedAt: nowUtcIsoSeconds(),
    artifacts,
    summary,
    error: failure
  });
  await writeRunManifest(manifest);

  if (failure !== undefined) throw failure;
  return manifest;
}
