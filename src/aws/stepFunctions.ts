import {
  DescribeExecutionCommand,
  DescribeExecutionCommandOutput,
  ExecutionListItem,
  GetExecutionHistoryCommand,
  GetExecutionHistoryCommandOutput,
  HistoryEvent,
  ListExecutionsCommand,
  ListExecutionsCommandOutput,
  SFNClient
} from "@aws-sdk/client-sfn";
import { LookupError, toLookupError } from "../errors";
import { ExecutionDescription, ExecutionHistoryEvent, ExecutionListEntry } from "../types/execution";
import { WorkflowClient } from "../workflow/client";

export interface AwsClientConfig {
  region?: string;
  endpoint?: string;
}

// The slice of SFNClient this adapter sends through.
export interface StepFunctionsSender {
  send(command: ListExecutionsCommand): Promise<ListExecutionsCommandOutput>;
  send(command: DescribeExecutionCommand): Promise<DescribeExecutionCommandOutput>;
  send(command: GetExecutionHistoryCommand): Promise<GetExecutionHistoryCommandOutput>;
}

// ListExecutions and GetExecutionHistory both cap a page at 1000 items.
const MAX_PAGE_SIZE = 1000;

function requireField<T>(value: T | undefined, field: string, context: string): T {
  if (value === undefined || value === null) {
    throw new LookupError(`${context}: response is missing ${field}`);
  }
  return value;
}

function toListEntry(item: ExecutionListItem): ExecutionListEntry {
  const context = `execution ${item.executionArn ?? "<no arn>"}`;
  return {
    name: requireField(item.name, "name", context),
    status: requireField(item.status, "status", context),
    startTime: requireField(item.startDate, "startDate", context),
    stopTime: item.stopDate ?? null,
    executionRef: requireField(item.executionArn, "executionArn", context)
  };
}

export function toHistoryEvent(event: HistoryEvent): ExecutionHistoryEvent {
  const id = event.id ?? -1;
  const type = event.type ?? "Unknown";
  if (type === "LambdaFunctionSucceeded") {
    return { kind: "lambdaSucceeded", id, type, output: event.lambdaFunctionSucceededEventDetails?.output ?? null };
  }
  if (type === "LambdaFunctionFailed") {
    return {
      kind: "lambdaFailed",
      id,
      type,
      error: event.lambdaFunctionFailedEventDetails?.error ?? null,
      cause: event.lambdaFunctionFailedEventDetails?.cause ?? null
    };
  }
  return { kind: "other", id, type };
}

export class StepFunctionsWorkflowClient implements WorkflowClient {
  private readonly client: StepFunctionsSender;

  constructor(config: AwsClientConfig = {}, client?: StepFunctionsSender) {
    this.client = client ?? new SFNClient({ region: config.region, endpoint: config.endpoint });
  }

  async listExecutions(workflowId: string, limit: number): Promise<ExecutionListEntry[]> {
    const entries: ExecutionListEntry[] = [];
    let nextToken: string | undefined;
    try {
      do {
        const response = await this.client.send(
          new ListExecutionsCommand({
            stateMachineArn: workflowId,
            maxResults: Math.min(MAX_PAGE_SIZE, limit - entries.length),
            nextToken
          })
        );
        for (const item of response.executions ?? []) {
          entries.push(toListEntry(item));
        }
        nextToken = response.nextToken;
      } while (nextToken && entries.length < limit);
    } catch (error) {
      throw toLookupError(error, `ListExecutions ${workflowId}`);
    }
    return entries.slice(0, limit);
  }

  async describeExecution(executionRef: string): Promise<ExecutionDescription> {
    try {
      const response = await this.client.send(new DescribeExecutionCommand({ executionArn: executionRef }));
      const context = `execution ${executionRef}`;
      return {
        name: requireField(response.name, "name", context),
        status: requireField(response.status, "status", context),
        startTime: requireField(response.startDate, "startDate", context),
        stopTime: response.stopDate ?? null,
        executionRef: requireField(response.executionArn, "executionArn", context),
        input: response.input ?? null,
        output: response.output ?? null
      };
    } catch (error) {
      throw toLookupError(error, `DescribeExecution ${executionRef}`, executionRef);
    }
  }

  async getExecutionHistory(executionRef: string): Promise<ExecutionHistoryEvent[]> {
    const events: ExecutionHistoryEvent[] = [];
    let nextToken: string | undefined;
    try {
      do {
        const response = await this.client.send(
          new GetExecutionHistoryCommand({
            executionArn: executionRef,
            maxResults: MAX_PAGE_SIZE,
            nextToken
          })
        );
        for (const event of response.events ?? []) {
          events.push(toHistoryEvent(event));
        }
        nextToken = response.nextToken;
      } while (nextToken);
    } catch (error) {
      throw toLookupError(error, `GetExecutionHistory ${executionRef}`, executionRef);
    }
    return events;
  }
}
