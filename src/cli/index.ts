#!/usr/bin/env node
import path from "path";
import dotenv from "dotenv";
import { Command } from "commander";
import pkg from "../../package.json";
import { S3ObjectStore } from "../aws/s3";
import { AwsClientConfig, StepFunctionsWorkflowClient } from "../aws/stepFunctions";
import { runAudit, AuditDeps } from "../commands/audit";
import { runBackfill } from "../commands/backfill";
import { runReport } from "../commands/report";
import { loadConfig } from "../config/loadConfig";

function readArgValue(argv: string[], flag: string): string | undefined {
  const prefix = `${flag}=`;
  const inlineArg = argv.find((arg) => arg.startsWith(prefix));
  if (inlineArg) return inlineArg.slice(prefix.length);
  const index = argv.indexOf(flag);
  if (index >= 0) {
    return argv[index + 1];
  }
  return undefined;
}

function resolveEnvPath(argv: string[], fallback: string): string {
  const cliValue = readArgValue(argv, "--env-file");
  if (cliValue) return cliValue;
  return process.env.INGEST_AUDIT_ENV_FILE ?? process.env.DOTENV_CONFIG_PATH ?? fallback;
}

const defaultEnvPath = path.resolve(__dirname, "..", "..", ".env");
const envPath = resolveEnvPath(process.argv.slice(2), defaultEnvPath);
dotenv.config({ path: envPath });

function awsDeps(region: string | undefined): AuditDeps {
  const config: AwsClientConfig = {
    region: region ?? process.env.AWS_REGION,
    endpoint: process.env.AWS_ENDPOINT_URL
  };
  return {
    workflows: new StepFunctionsWorkflowClient(config),
    objects: new S3ObjectStore(config)
  };
}

const program = new Command();

program
  .name("ingest-audit")
  .description("Audit discover/ingest workflow executions and report queued granules")
  .version(pkg.version);

program.option(
  "--env-file <path>",
  "Path to .env file (overrides INGEST_AUDIT_ENV_FILE/DOTENV_CONFIG_PATH)",
  envPath
);

program
  .command("run")
  .description("List, enrich, backfill and report in one pass")
  .requiredOption("--config <path>", "Path to the audit config JSON")
  .option("--out <dir>", "Output directory", "./audit_out")
  .option("--run-id <id>", "Run ID used to prefix artifacts (default: current UTC time)")
  .option("--region <region>", "AWS region (default: AWS_REGION)")
  .action(async (opts) => {
    const config = await loadConfig(opts.config);
    await runAudit(awsDeps(opts.region), {
      config,
      configPath: opts.config,
      outDir: opts.out,
      runId: opts.runId
    });
  });

program
  .command("backfill")
  .description("Backfill queued granule counts into a post-build snapshot and report")
  .requiredOption("--config <path>", "Path to the audit config JSON")
  .requiredOption("--snapshot <path>", "Post-build snapshot (*_result_debug_data.json)")
  .option("--out <dir>", "Output directory", "./audit_out")
  .option("--run-id <id>", "Run ID used to prefix artifacts (default: current UTC time)")
  .option("--region <region>", "AWS region (default: AWS_REGION)")
  .action(async (opts) => {
    const config = await loadConfig(opts.config);
    await runBackfill(awsDeps(opts.region), {
      config,
      configPath: opts.config,
      snapshotPath: opts.snapshot,
      outDir: opts.out,
      runId: opts.runId
    });
  });

program
  .command("report")
  .description("Render a report from any snapshot")
  .requiredOption("--snapshot <path>", "Snapshot to render")
  .option("--out <path>", "Report path. If omitted, writes to stdout.")
  .option("--children", "Include one line per ingest execution", false)
  .option("--failures", "Include discover failure causes", false)
  .action(async (opts) => {
    await runReport({
      snapshotPath: opts.snapshot,
      outPath: opts.out,
      includeChildren: opts.children,
      includeFailures: opts.failures
    });
  });

program.parseAsync().catch((error) => {
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
