import path from "path";

function artifactPath(outDir: string, runId: string, suffix: string): string {
  return path.join(outDir, `${runId}_${suffix}`);
}

export function buildSnapshotPath(outDir: string, runId: string): string {
  return artifactPath(outDir, runId, "result_debug_data.json");
}

export function backfillSnapshotPath(outDir: string, runId: string): string {
  return artifactPath(outDir, runId, "result_raw_data.json");
}

export function reportPath(outDir: string, runId: string): string {
  return artifactPath(outDir, runId, "report_final.txt");
}

export function runManifestPath(outDir: string, runId: string): string {
  return artifactPath(outDir, runId, "run_manifest.json");
}
