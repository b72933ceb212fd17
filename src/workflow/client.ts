import { ExecutionDescription, ExecutionHistoryEvent, ExecutionListEntry } from "../types/execution";

export interface WorkflowClient {
  listExecutions(workflowId: string, limit: number): Promise<ExecutionListEntry[]>;
  describeExecution(executionRef: string): Promise<ExecutionDescription>;
  getExecutionHistory(executionRef: string): Promise<ExecutionHistoryEvent[]>;
}

export interface ObjectStore {
  getObject(bucket: string, key: string): Promise<Uint8Array>;
}

export type DescribeFn = (executionRef: string) => Promise<ExecutionDescription>;
