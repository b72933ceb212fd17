import { z } from "zod";
import { DEFAULT_DISCOVER_EVENT_INDEX, EventLocator } from "../backfill/metadataBackfill";

const WorkflowSchema = (defaultLimit: number) =>
  z.object({
    workflow_id: z.string().min(1),
    limit: z.number().int().positive().default(defaultLimit)
  });

const EventLocatorSchema = z.discriminatedUnion("mode", [
  z.object({
    mode: z.literal("index"),
    index: z.number().int().nonnegative().default(DEFAULT_DISCOVER_EVENT_INDEX)
  }),
  z.object({ mode: z.literal("first_lambda_outcome") })
]);

export const AuditConfigSchema = z.object({
  discover: WorkflowSchema(100),
  ingest: WorkflowSchema(1000),
  report: z
    .object({
      include_children: z.boolean().default(true),
      include_failures: z.boolean().default(true)
    })
    .default({}),
  backfill: z
    .object({
      event_locator: EventLocatorSchema.default({ mode: "index", index: DEFAULT_DISCOVER_EVENT_INDEX })
    })
    .default({}),
  concurrency: z.number().int().positive().max(64).default(8),
  lookup_failure_threshold: z.number().min(0).max(1).default(0.5)
});

export type AuditConfig = z.infer<typeof AuditConfigSchema>;

export function toEventLocator(config: AuditConfig): EventLocator {
  const locator = config.backfill.event_locator;
  return locator.mode === "index" ? { mode: "index", index: locator.index } : { mode: "firstLambdaOutcome" };
}
