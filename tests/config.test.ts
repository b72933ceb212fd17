import { describe, expect, it } from "vitest";
import path from "path";
import { AuditConfigSchema, toEventLocator } from "../src/config/auditConfig";
import { loadConfig } from "../src/config/loadConfig";

const fixturesDir = path.join(process.cwd(), "fixtures");

describe("audit config", () => {
  it("fills defaults for omitted settings", () => {
    const config = AuditConfigSchema.parse({
      discover: { workflow_id: "discover-sm" },
      ingest: { workflow_id: "ingest-sm" }
    });

    expect(config).toEqual({
      discover: { workflow_id: "discover-sm", limit: 100 },
      ingest: { workflow_id: "ingest-sm", limit: 1000 },
      report: { include_children: true, include_failures: true },
      backfill: { event_locator: { mode: "index", index: 4 } },
      concurrency: 8,
      lookup_failure_threshold: 0.5
    });
    expect(toEventLocator(config)).toEqual({ mode: "index", index: 4 });
  });

  it("loads a config file", async () => {
    const config = await loadConfig(path.join(fixturesDir, "audit.config.json"));

    expect(config.discover.limit).toBe(25);
    expect(config.ingest.limit).toBe(1000);
    expect(config.report).toEqual({ include_children: false, include_failures: true });
    expect(toEventLocator(config)).toEqual({ mode: "firstLambdaOutcome" });
    expect(config.concurrency).toBe(4);
  });

  it("reports every invalid field", () => {
    const result = AuditConfigSchema.safeParse({
      discover: { workflow_id: "", limit: 0 },
      ingest: { workflow_id: "ingest-sm" },
      lookup_failure_threshold: 2
    });

    expect(result.success).toBe(false);
    if (result.success) return;
    expect(result.error.issues.map((issue) => issue.path.join("."))).toEqual([
      "discover.workflow_id",
      "discover.limit",
      "lookup_failure_threshold"
    ]);
  });
});
