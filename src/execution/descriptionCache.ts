import { toLookupError } from "../errors";
import { ExecutionDescription } from "../types/execution";
import { DescribeFn } from "../workflow/client";

/**
 * Single-flight cache over `describeExecution`: each reference is fetched at
 * most once, and concurrent callers share the pending request.
 */
export class DescriptionCache {
  private readonly pending = new Map<string, Promise<ExecutionDescription>>();

  constructor(private readonly describe: DescribeFn) {}

  get(executionRef: string): Promise<ExecutionDescription> {
    const cached = this.pending.get(executionRef);
    if (cached) return cached;
    const request = this.describe(executionRef).catch((error: unknown) => {
      throw toLookupError(error, `describe ${executionRef}`, executionRef);
    });
    this.pending.set(executionRef, request);
    return request;
  }

  get size(): number {
    return this.pending.size;
  }

  asDescribeFn(): DescribeFn {
    return (executionRef) => this.get(executionRef);
  }
}
