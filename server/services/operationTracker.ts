import { randomUUID } from "crypto";
import { ControlPlaneError, toErrorBody } from "../errors";

export type OperationKind = "bootstrap" | "join" | "leave";
export type OperationStatus = "pending" | "running" | "succeeded" | "failed";

export type OperationError = {
  message: string;
  code: string;
  retry_safe: boolean;
};

export type OperationRecord = {
  id: string;
  kind: OperationKind;
  status: OperationStatus;
  phase: string | null;
  startedAt: Date;
  finishedAt: Date | null;
  result: unknown;
  error: OperationError | null;
};

export type OperationContext = {
  readonly id: string;
  reportPhase(phase: string): void;
};

const DEFAULT_RETENTION_MS = 60 * 60 * 1000;

function describeFailure(err: unknown): OperationError {
  if (err instanceof ControlPlaneError) return toErrorBody(err);
  return {
    message: err instanceof Error ? err.message : String(err),
    code: "INTERNAL_ERROR",
    retry_safe: false,
  };
}

/** In-memory registry of orchestration runs, polled by callers that asked for async dispatch. */
export class OperationTracker {
  private readonly operations = new Map<string, OperationRecord>();

  constructor(
    private readonly retentionMs: number = DEFAULT_RETENTION_MS,
    private readonly now: () => Date = () => new Date(),
  ) {}

  get(id: string): OperationRecord | undefined {
    return this.operations.get(id);
  }

  /** Runs `work` and resolves with its result once it finishes. */
  async run<T>(kind: OperationKind, work: (ctx: OperationContext) => Promise<T>): Promise<T> {
    const record = this.register(kind);
    return this.execute(record, work);
  }

  /** Starts `work` and returns its operation id immediately. */
  dispatch<T>(kind: OperationKind, work: (ctx: OperationContext) => Promise<T>): string {
    const record = this.register(kind);
    this.execute(record, work).catch((err: unknown) => {
      console.warn(`[operations] ${kind} ${record.id} failed: ${err instanceof Error ? err.message : String(err)}`);
    });
    return record.id;
  }

  /** Drops finished operations older than the retention window. */
  prune(): number {
    const cutoff = this.now().getTime() - this.retentionMs;
    let removed = 0;
    for (const [id, record] of this.operations) {
      if (record.finishedAt && record.finishedAt.getTime() < cutoff) {
        this.operations.delete(id);
        removed++;
      }
    }
    return removed;
  }

  private register(kind: OperationKind): OperationRecord {
    this.prune();
    const record: OperationRecord = {
      id: randomUUID(),
      kind,
      status: "pending",
      phase: null,
      startedAt: this.now(),
      finishedAt: null,
      result: null,
      error: null,
    };
    this.operations.set(record.id, record);
    return record;
  }

  private async execute<T>(record: OperationRecord, work: (ctx: OperationContext) => Promise<T>): Promise<T> {
    record.status = "running";
    const ctx: OperationContext = {
      id: record.id,
      reportPhase: (phase) => {
        record.phase = phase;
      },
    };
    try {
      const result = await work(ctx);
      record.status = "succeeded";
      record.result = result;
      return result;
    } catch (err) {
      record.status = "failed";
      record.error = describeFailure(err);
      throw err;
    } finally {
      record.finishedAt = this.now();
    }
  }
}
