import { UNKNOWN } from "../execution/executionRecord";
import { RelationTree } from "../types/relationTree";

export interface ReportOptions {
  includeChildren: boolean;
  includeFailures: boolean;
}

export function renderReport(tree: RelationTree, options: ReportOptions): string {
  const lines: string[] = [];

  for (const node of tree.values()) {
    const { info } = node;
    lines.push(
      [
        info.start,
        info.status,
        info.duration,
        String(info.queued_granules_count ?? UNKNOWN),
        info.collection,
        info.provider
      ].join("\t")
    );

    if (options.includeChildren) {
      for (const child of node.children) {
        for (const childInfo of Object.values(child)) {
          lines.push(["", childInfo.start, childInfo.status, childInfo.duration, childInfo.granuleId].join("\t"));
        }
      }
    }

    if (options.includeFailures && info.fail !== undefined) {
      lines.push(`\t${info.fail}`);
    }
    lines.push("");
  }

  return lines.map((line) => `${line}\n`).join("");
}
