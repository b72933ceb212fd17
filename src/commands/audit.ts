import path from "path";
import { backfillMetadata } from "../backfill/metadataBackfill";
import { AuditConfig, toEventLocator } from "../config/auditConfig";
import { collectExecutions } from "../execution/collect";
import { DescriptionCache } from "../execution/descriptionCache";
import { backfillSnapshotPath, buildSnapshotPath, reportPath } from "../io/paths";
import { buildRunManifest, writeRunManifest } from "../io/runManifest";
import { writeSnapshot } from "../io/snapshot";
import { renderReport } from "../report/renderReport";
import { formatSummary, summarizeTree } from "../report/summary";
import { buildRelationTree } from "../tree/relationTree";
import { RelationTree } from "../types/relationTree";
import { RunManifest, RunManifestArtifacts } from "../types/runManifest";
import { writeText } from "../utils/fs";
import { nowUtcIsoFileSafe, nowUtcIsoSeconds } from "../utils/time";
import { ObjectStore, WorkflowClient } from "../workflow/client";

export interface AuditDeps {
  workflows: WorkflowClient;
  objects: ObjectStore;
}

export interface AuditRunOptions {
  config: AuditConfig;
  configPath: string;
  outDir: string;
  runId?: string;
}

export function emptyArtifacts(): RunManifestArtifacts {
  return { build_snapshot: null, backfill_snapshot: null, report: null };
}

/**
 * Backfill, second snapshot and report: the part shared by a full run and a
 * run resumed from a post-build snapshot.
 */
export async function finishAudit(
  tree: RelationTree,
  deps: AuditDeps,
  config: AuditConfig,
  outDir: string,
  runId: string,
  artifacts: RunManifestArtifacts
): Promise<RelationTree> {
  const backfill = await backfillMetadata(
    tree,
    {
      getHistory: (executionRef) => deps.workflows.getExecutionHistory(executionRef),
      objects: deps.objects
    },
    {
      locator: toEventLocator(config),
      concurrency: config.concurrency,
      lookupFailureThreshold: config.lookup_failure_threshold
    }
  );
  console.log(`Backfilled ${backfill.tree.size} discover executions (${backfill.failures} could not be read)`);

  const backfillPath = backfillSnapshotPath(outDir, runId);
  await writeSnapshot(backfillPath, backfill.tree);
  artifacts.backfill_snapshot = backfillPath;

  const report = renderReport(backfill.tree, {
    includeChildren: config.report.include_children,
    includeFailures: config.report.include_failures
  });
  const textPath = reportPath(outDir, runId);
  await writeText(textPath, report);
  artifacts.report = textPath;
  console.log(`Wrote report to ${textPath}`);

  return backfill.tree;
}

export async function runAudit(deps: AuditDeps, options: AuditRunOptions): Promise<RunManifest> {
  const { config } = options;
  const outDir = path.resolve(options.outDir);
  const runId = options.runId ?? nowUtcIsoFileSafe();
  const startedAt = nowUtcIsoSeconds();
  const artifacts = emptyArtifacts();

  let tree: RelationTree | null = null;
  let failure: unknown;
  try {
    const cache = new DescriptionCache((executionRef) => deps.workflows.describeExecution(executionRef));
    const collected = await collectExecutions(deps.workflows, cache, {
      discover: { workflowId: config.discover.workflow_id, limit: config.discover.limit },
      ingest: { workflowId: config.ingest.workflow_id, limit: config.ingest.limit },
      concurrency: config.concurrency,
      lookupFailureThreshold: config.lookup_failure_threshold
    });
    console.log(
      `Listed ${collected.discoveries.length} discover and ${collected.ingestions.length} ingest executions`
    );
    if (collected.lookupFailures) {
      console.warn(`${collected.lookupFailures} executions could not be described`);
    }

    const built = await buildRelationTree(collected.discoveries, collected.ingestions, cache.asDescribeFn(), {
      concurrency: config.concurrency,
      lookupFailureThreshold: config.lookup_failure_threshold
    });
    if (built.syntheticRoots.length) {
      console.log(`Added ${built.syntheticRoots.length} discover executions outside the listing window`);
    }

    const buildPath = buildSnapshotPath(outDir, runId);
    await writeSnapshot(buildPath, built.tree);
    artifacts.build_snapshot = buildPath;

    tree = await finishAudit(built.tree, deps, config, outDir, runId, artifacts);
  } catch (error) {
    failure = error;
  }

  const summary = tree ? summarizeTree(tree) : null;
  if (summary) console.log(formatSummary(summary));

  const manifest = buildRunManifest({
    runId,
    mode: "run",
    outDir,
    configPath: path.resolve(options.configPath),
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
