export type QueuedGranulesCount = number | "unknown" | "REPLACE NOT FOUND";

export interface ExecutionInfo {
  status: string;
  start: string;
  duration: string;
  parent: string;
  collection: string;
  provider: string;
  granuleId: string;
  queued_granules_count?: QueuedGranulesCount;
  fail?: string;
  error?: string;
}

export type ChildEntry = Record<string, ExecutionInfo>;

export interface RelationTreeNode {
  info: ExecutionInfo;
  children: ChildEntry[];
}

/** Discovery-rooted forest keyed by execution reference, in insertion order. */
export type RelationTree = Map<string, RelationTreeNode>;

export type RelationTreeSnapshot = Record<string, RelationTreeNode>;
