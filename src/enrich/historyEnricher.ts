import { z } from "zod";
import { EnrichmentError } from "../errors";
import { ExecutionRecord, ProviderMetadata } from "../execution/executionRecord";
import { ExecutionDescription } from "../types/execution";
import { formatZodIssues } from "../validation/zodIssues";
import { Resolution, failed, resolved, skipped } from "./resolution";

const ParentInputSchema = z.object({
  payload: z.object({
    meta: z.object({
      source: z.string().min(1),
      execution_name: z.string().min(1)
    })
  })
});

const GranuleOutputSchema = z.object({
  meta: z.object({
    cnmResponse: z.object({
      identifier: z.string()
    })
  })
});

const DescriptiveInputSchema = z.object({
  meta: z.object({
    collection: z.object({
      name: z.string(),
      meta: z.object({
        provider_path: z.string()
      })
    }),
    provider: z.object({
      protocol: z.string(),
      host: z.string()
    })
  })
});

function parsePayload<T>(
  raw: string | null,
  field: "input" | "output",
  schema: z.ZodType<T>,
  executionRef: string
): T {
  if (raw === null) {
    throw new EnrichmentError(`execution ${field} is empty`, executionRef);
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new EnrichmentError(`execution ${field} is not valid JSON`, executionRef, { cause: error });
  }
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new EnrichmentError(`execution ${field} ${formatZodIssues(result.error)}`, executionRef);
  }
  return result.data;
}

function attempt<T>(derive: () => T): Resolution<T> {
  try {
    return resolved(derive());
  } catch (error) {
    if (error instanceof EnrichmentError) return failed(error);
    throw error;
  }
}

export function stateMachineToExecutionRef(stateMachineRef: string, executionName: string): string {
  return `${stateMachineRef.replaceAll("stateMachine", "execution")}:${executionName}`;
}

export function composeProviderUri(protocol: string, host: string, providerPath: string): string {
  const trimmed = providerPath.startsWith("/") ? providerPath.slice(1) : providerPath;
  return `${protocol}://${host}/${trimmed}`;
}

/** Derives the discovery run that queued this ingestion run, from its own input. */
export function resolveParent(
  record: ExecutionRecord,
  description: ExecutionDescription | null
): Resolution<string> {
  if (!description) return skipped("no description payload");
  return attempt(() => {
    const { meta } = parsePayload(description.input, "input", ParentInputSchema, record.executionRef).payload;
    const parent = stateMachineToExecutionRef(meta.source, meta.execution_name);
    if (parent === record.executionRef) {
      throw new EnrichmentError("execution input names the execution itself as parent", record.executionRef);
    }
    return parent;
  });
}

export function resolveGranule(
  record: ExecutionRecord,
  description: ExecutionDescription | null
): Resolution<string> {
  if (record.status !== "SUCCEEDED") return skipped(`status is ${record.status}`);
  if (!description) return skipped("no description payload");
  return attempt(
    () => parsePayload(description.output, "output", GranuleOutputSchema, record.executionRef).meta.cnmResponse.identifier
  );
}

export function resolveDescriptiveMetadata(
  description: ExecutionDescription | null
): Resolution<ProviderMetadata> {
  if (!description) return skipped("no description payload");
  return attempt(() => {
    const { meta } = parsePayload(description.input, "input", DescriptiveInputSchema, description.executionRef);
    return {
      collection: meta.collection.name,
      provider: composeProviderUri(meta.provider.protocol, meta.provider.host, meta.collection.meta.provider_path)
    };
  });
}

export function enrichIngestion(
  record: ExecutionRecord,
  description: ExecutionDescription | null
): ExecutionRecord {
  return record
    .withParent(resolveParent(record, description))
    .withGranule(resolveGranule(record, description));
}

// For an ingestion run the description is its parent's.
export function enrichDescriptive(
  record: ExecutionRecord,
  description: ExecutionDescription | null
): ExecutionRecord {
  return record.withMetadata(resolveDescriptiveMetadata(description));
}
