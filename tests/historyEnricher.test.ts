import { describe, expect, it } from "vitest";
import { EnrichmentError } from "../src/errors";
import {
  composeProviderUri,
  enrichDescriptive,
  enrichIngestion,
  resolveDescriptiveMetadata,
  resolveGranule,
  resolveParent
} from "../src/enrich/historyEnricher";
import { ExecutionRecord } from "../src/execution/executionRecord";
import { ExecutionDescription } from "../src/types/execution";
import {
  discoverInput,
  discoverRef,
  executionDescription,
  ingestInput,
  ingestOutput,
  ingestRef,
  listEntry
} from "./fakes";

function recordOf(description: ExecutionDescription): ExecutionRecord {
  return ExecutionRecord.fromListing(listEntry(description));
}

describe("resolveParent", () => {
  it("turns the source state machine into the parent execution reference", () => {
    const description = executionDescription(ingestRef("g1"), { input: ingestInput("run-b") });

    expect(resolveParent(recordOf(description), description)).toEqual({
      state: "resolved",
      value: discoverRef("run-b")
    });
  });

  it("skips without a description payload", () => {
    const record = recordOf(executionDescription(ingestRef("g1")));

    expect(resolveParent(record, null)).toEqual({ state: "skipped", reason: "no description payload" });
  });

  it("fails on malformed input", () => {
    const description = executionDescription(ingestRef("g1"), { input: "{not json" });
    const result = resolveParent(recordOf(description), description);

    expect(result.state).toBe("failed");
    if (result.state !== "failed") return;
    expect(result.error).toBeInstanceOf(EnrichmentError);
    expect(result.error.message).toBe("execution input is not valid JSON");
    expect(result.error.executionRef).toBe(ingestRef("g1"));
  });

  it("names the missing field", () => {
    const input = JSON.stringify({ payload: { meta: { source: "arn:aws:states:x:stateMachine:Y" } } });
    const description = executionDescription(ingestRef("g1"), { input });
    const result = resolveParent(recordOf(description), description);

    expect(result.state).toBe("failed");
    if (result.state !== "failed") return;
    expect(result.error.message).toBe("execution input payload.meta.execution_name: Required");
  });

  it("refuses a run that names itself as parent", () => {
    const description = executionDescription(discoverRef("run-b"), { input: ingestInput("run-b") });
    const result = resolveParent(recordOf(description), description);

    expect(result.state).toBe("failed");
  });
});

describe("resolveGranule", () => {
  it("reads the CNM identifier of a successful run", () => {
    const description = executionDescription(ingestRef("g1"), { output: ingestOutput("granule-001") });

    expect(resolveGranule(recordOf(description), description)).toEqual({
      state: "resolved",
      value: "granule-001"
    });
  });

  it("does not apply to runs that did not succeed", () => {
    const description = executionDescription(ingestRef("g1"), {
      status: "FAILED",
      output: ingestOutput("granule-001")
    });
    const record = enrichIngestion(recordOf(description), description);

    expect(record.granuleId).toEqual({ state: "skipped", reason: "status is FAILED" });
    expect(record.info().granuleId).toBe("unknown");
  });

  it("fails when a successful run has no output", () => {
    const description = executionDescription(ingestRef("g1"));
    const result = resolveGranule(recordOf(description), description);

    expect(result.state).toBe("failed");
    if (result.state !== "failed") return;
    expect(result.error.message).toBe("execution output is empty");
  });
});

describe("resolveDescriptiveMetadata", () => {
  it("composes the provider URI with exactly one slash", () => {
    expect(composeProviderUri("https", "example.com", "/data")).toBe("https://example.com/data");
    expect(composeProviderUri("https", "example.com", "data")).toBe("https://example.com/data");
  });

  it("strips only one leading slash", () => {
    expect(composeProviderUri("s3", "bucket", "//nested")).toBe("s3://bucket//nested");
  });

  it("reads collection and provider from the input", () => {
    const description = executionDescription(discoverRef("b"), { input: discoverInput("MODIS_A", "/data/modis") });

    expect(resolveDescriptiveMetadata(description)).toEqual({
      state: "resolved",
      value: { collection: "MODIS_A", provider: "https://example.com/data/modis" }
    });
  });

  it("keeps already resolved fields when metadata fails", () => {
    const own = executionDescription(ingestRef("g1"), {
      input: ingestInput("run-b"),
      output: ingestOutput("granule-001")
    });
    const parent = executionDescription(discoverRef("run-b"), { input: "[]" });

    const record = enrichDescriptive(enrichIngestion(recordOf(own), own), parent);
    const info = record.info();

    expect(info.parent).toBe(discoverRef("run-b"));
    expect(info.granuleId).toBe("granule-001");
    expect(info.collection).toBe("unknown");
    expect(info.error).toBe("EnrichmentError: execution input <root>: Expected object, received array");
  });
});
