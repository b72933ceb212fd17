import { describeError } from "../errors";
import { Resolution, skipped, valueOr } from "../enrich/resolution";
import { ExecutionDescription, ExecutionListEntry, ExecutionStatus } from "../types/execution";
import { ExecutionInfo } from "../types/relationTree";
import { formatDuration } from "../utils/time";

export const UNKNOWN = "unknown";
export const NO_PARENT = "none";
export const PLACEHOLDER_STATUS = "UNKNOWN";

export interface ProviderMetadata {
  collection: string;
  provider: string;
}

interface ExecutionRecordFields {
  name: string;
  status: ExecutionStatus;
  executionRef: string;
  startTime: Date;
  stopTime: Date;
  parent: Resolution<string>;
  granuleId: Resolution<string>;
  metadata: Resolution<ProviderMetadata>;
  lookupError: string | null;
}

const NOT_RESOLVED = "not resolved yet";

/**
 * Normalized view of one workflow run. Instances never change; the `with*`
 * methods return a new record carrying one more resolved field.
 */
export class ExecutionRecord {
  readonly name: string;
  readonly status: ExecutionStatus;
  readonly executionRef: string;
  readonly startTime: Date;
  readonly stopTime: Date;
  readonly parent: Resolution<string>;
  readonly granuleId: Resolution<string>;
  readonly metadata: Resolution<ProviderMetadata>;
  readonly lookupError: string | null;

  private constructor(fields: ExecutionRecordFields) {
    this.name = fields.name;
    this.status = fields.status;
    this.executionRef = fields.executionRef;
    this.startTime = fields.startTime;
    this.stopTime = fields.stopTime;
    this.parent = fields.parent;
    this.granuleId = fields.granuleId;
    this.metadata = fields.metadata;
    this.lookupError = fields.lookupError;
  }

  static fromListing(entry: ExecutionListEntry): ExecutionRecord {
    const stop =
      entry.status === "RUNNING" || !entry.stopTime || entry.stopTime.getTime() < entry.startTime.getTime()
        ? entry.startTime
        : entry.stopTime;
    return new ExecutionRecord({
      name: entry.name,
      status: entry.status,
      executionRef: entry.executionRef,
      startTime: entry.startTime,
      stopTime: stop,
      parent: skipped(NOT_RESOLVED),
      granuleId: skipped(NOT_RESOLVED),
      metadata: skipped(NOT_RESOLVED),
      lookupError: null
    });
  }

  static fromDescription(description: ExecutionDescription): ExecutionRecord {
    return ExecutionRecord.fromListing(description);
  }

  static placeholder(executionRef: string, lookupError: string | null): ExecutionRecord {
    const epoch = new Date(0);
    return new ExecutionRecord({
      name: executionRef,
      status: PLACEHOLDER_STATUS,
      executionRef,
      startTime: epoch,
      stopTime: epoch,
      parent: skipped("placeholder"),
      granuleId: skipped("placeholder"),
      metadata: skipped("placeholder"),
      lookupError
    });
  }

  private copy(changes: Partial<ExecutionRecordFields>): ExecutionRecord {
    return new ExecutionRecord({ ...this.fields(), ...changes });
  }

  private fields(): ExecutionRecordFields {
    return {
      name: this.name,
      status: this.status,
      executionRef: this.executionRef,
      startTime: this.startTime,
      stopTime: this.stopTime,
      parent: this.parent,
      granuleId: this.granuleId,
      metadata: this.metadata,
      lookupError: this.lookupError
    };
  }

  withParent(parent: Resolution<string>): ExecutionRecord {
    return this.copy({ parent });
  }

  withGranule(granuleId: Resolution<string>): ExecutionRecord {
    return this.copy({ granuleId });
  }

  withMetadata(metadata: Resolution<ProviderMetadata>): ExecutionRecord {
    return this.copy({ metadata });
  }

  withLookupError(message: string): ExecutionRecord {
    return this.copy({ lookupError: message });
  }

  get parentRef(): string | null {
    return this.parent.state === "resolved" ? this.parent.value : null;
  }

  duration(): number {
    if (this.status === "RUNNING") return 0;
    return Math.max(0, this.stopTime.getTime() - this.startTime.getTime());
  }

  errors(): string[] {
    const messages: string[] = [];
    if (this.lookupError) messages.push(this.lookupError);
    for (const resolution of [this.parent, this.granuleId, this.metadata]) {
      if (resolution.state === "failed") messages.push(describeError(resolution.error));
    }
    return messages;
  }

  info(): ExecutionInfo {
    const metadata = valueOr<ProviderMetadata | null>(this.metadata, null);
    const info: ExecutionInfo = {
      status: this.status,
      start: this.startTime.toISOString(),
      duration: formatDuration(this.duration()),
      parent: valueOr(this.parent, NO_PARENT),
      collection: metadata?.collection ?? UNKNOWN,
      provider: metadata?.provider ?? UNKNOWN,
      granuleId: this.status === "SUCCEEDED" ? valueOr(this.granuleId, UNKNOWN) : UNKNOWN
    };
    const errors = this.errors();
    if (errors.length) {
      info.error = errors.join("; ");
    }
    return info;
  }
}
