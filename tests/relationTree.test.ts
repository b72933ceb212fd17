import { describe, expect, it } from "vitest";
import { LookupError } from "../src/errors";
import { enrichDescriptive, enrichIngestion } from "../src/enrich/historyEnricher";
import { DescriptionCache } from "../src/execution/descriptionCache";
import { ExecutionRecord } from "../src/execution/executionRecord";
import { UNRESOLVED_PARENT_REF, buildRelationTree } from "../src/tree/relationTree";
import { ExecutionDescription } from "../src/types/execution";
import {
  FakeWorkflowClient,
  discoverInput,
  discoverRef,
  executionDescription,
  ingestInput,
  ingestOutput,
  ingestRef,
  listEntry
} from "./fakes";

const options = { concurrency: 4, lookupFailureThreshold: 1 };

function discovery(description: ExecutionDescription): ExecutionRecord {
  return enrichDescriptive(ExecutionRecord.fromListing(listEntry(description)), description);
}

function ingestion(description: ExecutionDescription): ExecutionRecord {
  return enrichIngestion(ExecutionRecord.fromListing(listEntry(description)), description);
}

function ingestDescription(name: string, parentName: string): ExecutionDescription {
  return executionDescription(ingestRef(name), {
    input: ingestInput(parentName),
    output: ingestOutput(`granule-${name}`)
  });
}

describe("buildRelationTree", () => {
  it("builds one root per discovery run plus synthetic roots for unlisted parents", async () => {
    const a = executionDescription(discoverRef("A"), { status: "RUNNING", input: discoverInput("COLL_A") });
    const b = executionDescription(discoverRef("B"), { input: discoverInput("COLL_B", "data/b") });
    const c = executionDescription(discoverRef("C"), { status: "FAILED", input: discoverInput("COLL_C") });
    const client = new FakeWorkflowClient().addUnlisted(a).addUnlisted(b).addUnlisted(c);
    const cache = new DescriptionCache((ref) => client.describeExecution(ref));

    const g1 = ingestDescription("g1", "B");
    const g2 = ingestDescription("g2", "B");
    const g3 = ingestDescription("g3", "C");

    const { tree, syntheticRoots } = await buildRelationTree(
      [discovery(a), discovery(b)],
      [ingestion(g1), ingestion(g2), ingestion(g3)],
      cache.asDescribeFn(),
      options
    );

    expect([...tree.keys()]).toEqual([discoverRef("A"), discoverRef("B"), discoverRef("C")]);
    expect(tree.get(discoverRef("A"))?.children).toEqual([]);
    expect(tree.get(discoverRef("B"))?.children.map((child) => Object.keys(child)[0])).toEqual([
      ingestRef("g1"),
      ingestRef("g2")
    ]);
    expect(tree.get(discoverRef("C"))?.children.map((child) => Object.keys(child)[0])).toEqual([ingestRef("g3")]);
    expect(syntheticRoots).toEqual([discoverRef("C")]);

    expect(tree.get(discoverRef("C"))?.info).toEqual({
      status: "FAILED",
      start: "2024-03-01T10:00:00.000Z",
      duration: "0:05:00",
      parent: "none",
      collection: "COLL_C",
      provider: "https://example.com/data/modis",
      granuleId: "unknown"
    });
  });

  it("copies the parent's collection and provider onto each child", async () => {
    const b = executionDescription(discoverRef("B"), { input: discoverInput("COLL_B", "data/b") });
    const client = new FakeWorkflowClient().addUnlisted(b);

    const { tree } = await buildRelationTree(
      [discovery(b)],
      [ingestion(ingestDescription("g1", "B"))],
      (ref) => client.describeExecution(ref),
      options
    );

    expect(tree.get(discoverRef("B"))?.children[0]).toEqual({
      [ingestRef("g1")]: {
        status: "SUCCEEDED",
        start: "2024-03-01T10:00:00.000Z",
        duration: "0:05:00",
        parent: discoverRef("B"),
        collection: "COLL_B",
        provider: "https://example.com/data/b",
        granuleId: "granule-g1"
      }
    });
  });

  it("merges runs sharing an unlisted parent into a single synthetic root", async () => {
    const c = executionDescription(discoverRef("C"), { input: discoverInput() });
    const client = new FakeWorkflowClient().addUnlisted(c);
    const ingestions = ["g1", "g2", "g3", "g4"].map((name) => ingestion(ingestDescription(name, "C")));

    const { tree, syntheticRoots } = await buildRelationTree(
      [],
      ingestions,
      (ref) => client.describeExecution(ref),
      options
    );

    expect(tree.size).toBe(1);
    expect(tree.get(discoverRef("C"))?.children).toHaveLength(4);
    expect(syntheticRoots).toEqual([discoverRef("C")]);
    expect(client.describeCalls).toEqual([discoverRef("C")]);
  });

  it("does not describe listed parents twice when sharing the cache", async () => {
    const b = executionDescription(discoverRef("B"), { input: discoverInput() });
    const client = new FakeWorkflowClient().addUnlisted(b);
    const cache = new DescriptionCache((ref) => client.describeExecution(ref));
    await cache.get(discoverRef("B"));

    await buildRelationTree(
      [discovery(b)],
      [ingestion(ingestDescription("g1", "B")), ingestion(ingestDescription("g2", "B"))],
      cache.asDescribeFn(),
      options
    );

    expect(client.describeCalls).toEqual([discoverRef("B")]);
  });

  it("groups runs without a derivable parent under the unresolved root", async () => {
    const orphan = ExecutionRecord.fromListing(listEntry(ingestDescription("g9", "B")));
    const client = new FakeWorkflowClient();

    const { tree } = await buildRelationTree([], [orphan], (ref) => client.describeExecution(ref), options);

    expect([...tree.keys()]).toEqual([UNRESOLVED_PARENT_REF]);
    expect(tree.get(UNRESOLVED_PARENT_REF)?.info.status).toBe("UNKNOWN");
    expect(tree.get(UNRESOLVED_PARENT_REF)?.children).toHaveLength(1);
    expect(client.describeCalls).toEqual([]);
  });

  it("keeps a placeholder root when the parent cannot be described", async () => {
    const client = new FakeWorkflowClient();

    const { tree, lookupFailures } = await buildRelationTree(
      [],
      [ingestion(ingestDescription("g1", "missing"))],
      (ref) => client.describeExecution(ref),
      options
    );

    const node = tree.get(discoverRef("missing"));
    expect(lookupFailures).toBe(1);
    expect(node?.info.status).toBe("UNKNOWN");
    expect(node?.info.error).toBe(
      `LookupError: describe parent ${discoverRef("missing")}: ExecutionDoesNotExist: ${discoverRef("missing")}`
    );
    expect(node?.children[0][ingestRef("g1")].collection).toBe("unknown");
  });

  it("fails the run when most parent lookups fail", async () => {
    const client = new FakeWorkflowClient();

    await expect(
      buildRelationTree(
        [],
        [ingestion(ingestDescription("g1", "missing"))],
        (ref) => client.describeExecution(ref),
        { concurrency: 2, lookupFailureThreshold: 0.5 }
      )
    ).rejects.toBeInstanceOf(LookupError);
  });
});
