import { assertLookupHealth, describeError, toLookupError } from "../errors";
import { enrichDescriptive } from "../enrich/historyEnricher";
import { skipped } from "../enrich/resolution";
import { ExecutionRecord } from "../execution/executionRecord";
import { ExecutionDescription } from "../types/execution";
import { RelationTree } from "../types/relationTree";
import { mapWithConcurrency } from "../utils/pool";
import { DescribeFn } from "../workflow/client";

/** Root key collecting ingestion runs whose parent could not be derived. */
export const UNRESOLVED_PARENT_REF = "unresolved";

export interface RelationTreeOptions {
  concurrency: number;
  lookupFailureThreshold: number;
}

export interface RelationTreeResult {
  tree: RelationTree;
  syntheticRoots: string[];
  lookupFailures: number;
}

type ParentLookup =
  | { ok: true; description: ExecutionDescription }
  | { ok: false; error: string };

async function describeParents(
  parentRefs: string[],
  describe: DescribeFn,
  concurrency: number
): Promise<Map<string, ParentLookup>> {
  const lookups = await mapWithConcurrency(parentRefs, concurrency, async (ref): Promise<ParentLookup> => {
    try {
      return { ok: true, description: await describe(ref) };
    } catch (error) {
      return { ok: false, error: describeError(toLookupError(error, `describe parent ${ref}`, ref)) };
    }
  });
  return new Map(parentRefs.map((ref, index): [string, ParentLookup] => [ref, lookups[index]]));
}

function syntheticRoot(parentRef: string, lookup: ParentLookup | undefined): ExecutionRecord {
  if (!lookup) {
    return ExecutionRecord.placeholder(parentRef, null);
  }
  if (!lookup.ok) {
    return ExecutionRecord.placeholder(parentRef, lookup.error);
  }
  return enrichDescriptive(ExecutionRecord.fromDescription(lookup.description), lookup.description);
}

/**
 * Merges discovery and ingestion runs into a forest keyed by discovery
 * execution reference.
 *
 * Parents are described in parallel, one request per distinct reference.
 * Attaching children is a single-writer pass in input order, so two
 * ingestion runs sharing an unlisted parent always land under one synthetic
 * root.
 */
export async function buildRelationTree(
  discoveries: readonly ExecutionRecord[],
  ingestions: readonly ExecutionRecord[],
  describe: DescribeFn,
  options: RelationTreeOptions
): Promise<RelationTreeResult> {
  const tree: RelationTree = new Map();
  for (const discovery of discoveries) {
    tree.set(discovery.executionRef, { info: discovery.info(), children: [] });
  }

  const parentRefs = [
    ...new Set(ingestions.map((record) => record.parentRef).filter((ref): ref is string => ref !== null))
  ];
  const lookups = await describeParents(parentRefs, describe, options.concurrency);
  const lookupFailures = [...lookups.values()].filter((lookup) => !lookup.ok).length;

  const syntheticRoots: string[] = [];
  for (const ingestion of ingestions) {
    const parentRef = ingestion.parentRef ?? UNRESOLVED_PARENT_REF;
    const lookup = lookups.get(parentRef);

    let child = ingestion;
    if (lookup?.ok) {
      child = enrichDescriptive(ingestion, lookup.description);
    } else if (lookup) {
      child = ingestion.withMetadata(skipped("parent description unavailable"));
    }

    const entry = { [child.executionRef]: child.info() };
    const existing = tree.get(parentRef);
    if (existing) {
      existing.children.push(entry);
      continue;
    }

    tree.set(parentRef, { info: syntheticRoot(parentRef, lookup).info(), children: [entry] });
    syntheticRoots.push(parentRef);
  }

  assertLookupHealth("describe parents", lookupFailures, parentRefs.length, options.lookupFailureThreshold);

  return { tree, syntheticRoots, lookupFailures };
}
