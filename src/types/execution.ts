export type KnownExecutionStatus =
  | "RUNNING"
  | "SUCCEEDED"
  | "FAILED"
  | "TIMED_OUT"
  | "ABORTED"
  | "PENDING_REDRIVE";

// Upstream may add states; snapshots also carry the placeholder status "UNKNOWN".
export type ExecutionStatus = KnownExecutionStatus | (string & {});

export interface ExecutionListEntry {
  name: string;
  status: ExecutionStatus;
  startTime: Date;
  stopTime: Date | null;
  executionRef: string;
}

export interface ExecutionDescription extends ExecutionListEntry {
  input: string | null;
  output: string | null;
}

export type ExecutionHistoryEvent =
  | { kind: "lambdaSucceeded"; id: number; type: string; output: string | null }
  | { kind: "lambdaFailed"; id: number; type: string; error: string | null; cause: string | null }
  | { kind: "other"; id: number; type: string };
