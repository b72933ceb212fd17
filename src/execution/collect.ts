import { assertLookupHealth, describeError, toLookupError } from "../errors";
import { enrichDescriptive, enrichIngestion } from "../enrich/historyEnricher";
import { ExecutionDescription, ExecutionListEntry } from "../types/execution";
import { mapWithConcurrency } from "../utils/pool";
import { WorkflowClient } from "../workflow/client";
import { DescriptionCache } from "./descriptionCache";
import { ExecutionRecord } from "./executionRecord";

export interface WorkflowSelection {
  workflowId: string;
  limit: number;
}

export interface CollectOptions {
  discover: WorkflowSelection;
  ingest: WorkflowSelection;
  concurrency: number;
  lookupFailureThreshold: number;
}

export interface CollectedExecutions {
  discoveries: ExecutionRecord[];
  ingestions: ExecutionRecord[];
  lookupFailures: number;
}

async function listOrFail(
  client: WorkflowClient,
  label: string,
  selection: WorkflowSelection
): Promise<ExecutionListEntry[]> {
  try {
    return await client.listExecutions(selection.workflowId, selection.limit);
  } catch (error) {
    throw toLookupError(error, `list ${label} executions for ${selection.workflowId}`);
  }
}

/**
 * Lists both workflows and describes every run. Discovery runs get their own
 * collection and provider; ingestion runs get their parent and granule.
 * A failed listing is fatal; a failed describe only marks that record.
 */
export async function collectExecutions(
  client: WorkflowClient,
  cache: DescriptionCache,
  options: CollectOptions
): Promise<CollectedExecutions> {
  const discoverEntries = await listOrFail(client, "discover", options.discover);
  const ingestEntries = await listOrFail(client, "ingest", options.ingest);
  let lookupFailures = 0;

  const describeAndEnrich = async (
    entry: ExecutionListEntry,
    enrich: typeof enrichDescriptive
  ): Promise<ExecutionRecord> => {
    const record = ExecutionRecord.fromListing(entry);
    let description: ExecutionDescription;
    try {
      description = await cache.get(record.executionRef);
    } catch (error) {
      lookupFailures += 1;
      return record.withLookupError(describeError(error));
    }
    return enrich(record, description);
  };

  const discoveries = await mapWithConcurrency(discoverEntries, options.concurrency, (entry) =>
    describeAndEnrich(entry, enrichDescriptive)
  );
  const ingestions = await mapWithConcurrency(ingestEntries, options.concurrency, (entry) =>
    describeAndEnrich(entry, enrichIngestion)
  );

  assertLookupHealth(
    "describe executions",
    lookupFailures,
    discoverEntries.length + ingestEntries.length,
    options.lookupFailureThreshold
  );

  return { discoveries, ingestions, lookupFailures };
}
