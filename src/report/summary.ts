import { ExecutionInfo, RelationTree } from "../types/relationTree";
import { RunSummary } from "../types/runManifest";

function hasFailure(info: ExecutionInfo): boolean {
  return info.fail !== undefined || info.error !== undefined;
}

export function summarizeTree(tree: RelationTree): RunSummary {
  const summary: RunSummary = { roots: 0, children: 0, records: 0, failed: 0, succeeded: 0 };
  const count = (info: ExecutionInfo): void => {
    summary.records += 1;
    if (hasFailure(info)) summary.failed += 1;
    else summary.succeeded += 1;
  };

  for (const node of tree.values()) {
    summary.roots += 1;
    count(node.info);
    for (const child of node.children) {
      for (const info of Object.values(child)) {
        summary.children += 1;
        count(info);
      }
    }
  }
  return summary;
}

export function formatSummary(summary: RunSummary): string {
  return (
    `${summary.records} records (${summary.roots} discover, ${summary.children} ingest): ` +
    `${summary.failed} failed, ${summary.succeeded} succeeded`
  );
}
