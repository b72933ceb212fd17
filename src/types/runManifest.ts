export interface RunManifestError {
  message: string;
  stack?: string;
}

export interface RunSummary {
  roots: number;
  children: number;
  records: number;
  failed: number;
  succeeded: number;
}

export interface RunManifestArtifacts {
  build_snapshot: string | null;
  backfill_snapshot: string | null;
  report: string | null;
}

export interface RunManifest {
  schema_version: "1.0";
  run_id: string;
  mode: "run" | "backfill";
  out_dir: string;
  config_path: string;
  source_snapshot: string | null;
  started_at: string;
  ended_at: string;
  status: "success" | "error";
  artifacts: RunManifestArtifacts;
  summary: RunSummary | null;
  error: RunManifestError | null;
}
