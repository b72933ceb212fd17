import { runManifestPath } from "./paths";
import { writeJson } from "../utils/fs";
import { RunManifest, RunManifestArtifacts, RunManifestError, RunSummary } from "../types/runManifest";

export interface RunManifestParams {
  runId: string;
  mode: RunManifest["mode"];
  outDir: string;
  configPath: string;
  sourceSnapshot?: string | null;
  startedAt: string;
  endedAt: string;
  artifacts: RunManifestArtifacts;
  summary: RunSummary | null;
  error?: unknown;
}

function toManifestError(error: unknown): RunManifestError | null {
  if (error === undefined || error === null) return null;
  return {
    message: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined
  };
}

export function buildRunManifest(params: RunManifestParams): RunManifest {
  const error = toManifestError(params.error);
  return {
    schema_version: "1.0",
    run_id: params.runId,
    mode: params.mode,
    out_dir: params.outDir,
    config_path: params.configPath,
    source_snapshot: params.sourceSnapshot ?? null,
    started_at: params.startedAt,
    ended_at: params.endedAt,
    status: error ? "error" : "success",
    artifacts: params.artifacts,
    summary: params.summary,
    error
  };
}

export async function writeRunManifest(manifest: RunManifest): Promise<string> {
  const filePath = runManifestPath(manifest.out_dir, manifest.run_id);
  await writeJson(filePath, manifest);
  return filePath;
}
