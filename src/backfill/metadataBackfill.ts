import { z } from "zod";
import { BackfillError, LookupError, assertLookupHealth, describeError, errorMessage, toLookupError } from "../errors";
import { UNKNOWN } from "../execution/executionRecord";
import { UNRESOLVED_PARENT_REF } from "../tree/relationTree";
import { ExecutionHistoryEvent } from "../types/execution";
import { ExecutionInfo, QueuedGranulesCount, RelationTree, RelationTreeNode } from "../types/relationTree";
import { mapWithConcurrency } from "../utils/pool";
import { formatZodIssues } from "../validation/zodIssues";
import { ObjectStore } from "../workflow/client";

export const REPLACE_NOT_FOUND = "REPLACE NOT FOUND";
export const DEFAULT_DISCOVER_EVENT_INDEX = 4;

/**
 * Where the discover lambda's outcome sits in the execution history. The
 * workflow definition places it at index 4; `firstLambdaOutcome` searches
 * instead of trusting the position.
 */
export type EventLocator = { mode: "index"; index: number } | { mode: "firstLambdaOutcome" };

export interface BackfillDeps {
  getHistory(executionRef: string): Promise<ExecutionHistoryEvent[]>;
  objects: ObjectStore;
}

export interface BackfillOptions {
  locator: EventLocator;
  concurrency: number;
  lookupFailureThreshold: number;
}

export interface QueuedCountOutcome {
  count: QueuedGranulesCount;
  fail?: string;
}

export interface BackfillResult {
  tree: RelationTree;
  failures: number;
  lookupFailures: number;
}

const InlineCountSchema = z.object({
  meta: z.object({
    collection: z.object({
      meta: z.object({
        discover_tf: z.object({
          queued_granules_count: z.number().int().nonnegative()
        })
      })
    })
  })
});

const ReplaceSchema = z.object({
  Bucket: z.string().min(1),
  Key: z.string().min(1)
});

const ReplacedPayloadSchema = z.object({
  payload: z.object({
    granules: z.array(z.unknown())
  })
});

function isLambdaOutcome(event: ExecutionHistoryEvent): boolean {
  return event.kind === "lambdaSucceeded" || event.kind === "lambdaFailed";
}

export function locateDiscoverEvent(
  events: readonly ExecutionHistoryEvent[],
  locator: EventLocator,
  executionRef: string | null = null
): ExecutionHistoryEvent {
  if (locator.mode === "firstLambdaOutcome") {
    const found = events.find(isLambdaOutcome);
    if (!found) {
      throw new BackfillError("history has no lambda outcome event", executionRef);
    }
    return found;
  }
  const event = events[locator.index];
  if (!event) {
    throw new BackfillError(
      `history has ${events.length} events, no event at index ${locator.index}`,
      executionRef
    );
  }
  return event;
}

function parseJsonObject(raw: string, label: string, executionRef: string | null): Record<string, unknown> {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new BackfillError(`${label} is not valid JSON`, executionRef, { cause: error });
  }
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new BackfillError(`${label} is not a JSON object`, executionRef);
  }
  return Object.fromEntries(Object.entries(data));
}

function parseWith<T>(schema: z.ZodType<T>, data: unknown, label: string, executionRef: string | null): T {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new BackfillError(`${label} ${formatZodIssues(result.error)}`, executionRef);
  }
  return result.data;
}

async function countReplacedGranules(
  objects: ObjectStore,
  replace: unknown,
  executionRef: string | null
): Promise<number> {
  const pointer = parseWith(ReplaceSchema, replace, "replace pointer", executionRef);
  let body: Uint8Array;
  try {
    body = await objects.getObject(pointer.Bucket, pointer.Key);
  } catch (error) {
    throw new BackfillError(
      `could not fetch s3://${pointer.Bucket}/${pointer.Key}: ${errorMessage(error)}`,
      executionRef,
      { cause: error }
    );
  }
  const text = Buffer.from(body).toString("utf8");
  const document = parseJsonObject(text, `s3://${pointer.Bucket}/${pointer.Key}`, executionRef);
  return parseWith(ReplacedPayloadSchema, document, "replaced payload", executionRef).payload.granules.length;
}

/**
 * Reads the queued granule count (or the failure cause) of one discovery run
 * from its execution history. Throws {@link BackfillError} when the history
 * or the fallback object is not shaped as expected.
 */
export async function resolveQueuedCount(
  events: readonly ExecutionHistoryEvent[],
  objects: ObjectStore,
  locator: EventLocator,
  executionRef: string | null = null
): Promise<QueuedCountOutcome> {
  const event = locateDiscoverEvent(events, locator, executionRef);

  if (event.kind === "lambdaFailed") {
    return { count: UNKNOWN, fail: event.cause ?? event.error ?? "lambda failed without a cause" };
  }
  if (event.kind !== "lambdaSucceeded") {
    throw new BackfillError(`expected a lambda outcome event, got ${event.type} (id ${event.id})`, executionRef);
  }
  if (event.output === null) {
    throw new BackfillError(`lambda output is empty (event id ${event.id})`, executionRef);
  }

  const output = parseJsonObject(event.output, "lambda output", executionRef);
  if ("payload" in output) {
    const inline = parseWith(InlineCountSchema, output, "lambda output", executionRef);
    return { count: inline.meta.collection.meta.discover_tf.queued_granules_count };
  }
  if ("replace" in output) {
    return { count: await countReplacedGranules(objects, output.replace, executionRef) };
  }
  return { count: REPLACE_NOT_FOUND };
}

function annotate(node: RelationTreeNode, outcome: QueuedCountOutcome): RelationTreeNode {
  // A snapshot that was already backfilled may carry a fail from that pass.
  const { fail: _previousFail, ...rest } = node.info;
  const info: ExecutionInfo = { ...rest, queued_granules_count: outcome.count };
  if (outcome.fail !== undefined) {
    info.fail = outcome.fail;
  }
  return { info, children: node.children };
}

// Returns a new tree; per-root problems become `fail` annotations.
export async function backfillMetadata(
  tree: RelationTree,
  deps: BackfillDeps,
  options: BackfillOptions
): Promise<BackfillResult> {
  const entries = [...tree.entries()];
  let failures = 0;
  let lookupFailures = 0;
  let lookups = 0;

  const nodes = await mapWithConcurrency(entries, options.concurrency, async ([executionRef, node]) => {
    if (executionRef === UNRESOLVED_PARENT_REF || node.info.status === "RUNNING") {
      return annotate(node, { count: UNKNOWN });
    }

    lookups += 1;
    let events: ExecutionHistoryEvent[];
    try {
      events = await deps.getHistory(executionRef);
    } catch (error) {
      lookupFailures += 1;
      failures += 1;
      const lookupError = toLookupError(error, `history of ${executionRef}`, executionRef);
      return annotate(node, { count: UNKNOWN, fail: describeError(lookupError) });
    }

    try {
      return annotate(node, await resolveQueuedCount(events, deps.objects, options.locator, executionRef));
    } catch (error) {
      if (!(error instanceof BackfillError) && !(error instanceof LookupError)) throw error;
      failures += 1;
      return annotate(node, { count: UNKNOWN, fail: describeError(error) });
    }
  });

  assertLookupHealth("execution history", lookupFailures, lookups, options.lookupFailureThreshold);

  const backfilled: RelationTree = new Map();
  entries.forEach(([executionRef], index) => backfilled.set(executionRef, nodes[index]));
  return { tree: backfilled, failures, lookupFailures };
}
