import { readSnapshot } from "../io/snapshot";
import { renderReport } from "../report/renderReport";
import { formatSummary, summarizeTree } from "../report/summary";
import { writeText } from "../utils/fs";

export interface ReportCommandOptions {
  snapshotPath: string;
  outPath?: string;
  includeChildren: boolean;
  includeFailures: boolean;
}

export async function runReport(opts: ReportCommandOptions): Promise<void> {
  const tree = await readSnapshot(opts.snapshotPath);
  const text = renderReport(tree, {
    includeChildren: opts.includeChildren,
    includeFailures: opts.includeFailures
  });

  if (opts.outPath) {
    await writeText(opts.outPath, text);
    console.log(`Wrote report to ${opts.outPath}`);
    console.log(formatSummary(summarizeTree(tree)));
  } else {
    process.stdout.write(text);
  }
}
