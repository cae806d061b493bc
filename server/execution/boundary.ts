import { ExternalOperationFailure, type ExternalOperationName } from "../errors";
import { logBoundaryCrossing, logBoundaryReturn } from "./logging";
import type { ExternalOperationAdapter } from "./types";

/**
 * Runs one adapter call under a deadline. The call receives an AbortSignal
 * that fires at the deadline; the call is reported as failed at that moment
 * whether or not it honours the signal. Every failure surfaces as
 * ExternalOperationFailure.
 */
export async function runExternalOperation<T>(
  adapter: ExternalOperationAdapter,
  operation: ExternalOperationName,
  timeoutMs: number,
  detail: string,
  call: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  logBoundaryCrossing(adapter, operation, detail);
  const start = Date.now();
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(
        new ExternalOperationFailure({
          subsystem: adapter.subsystem,
          operation,
          reason: `timed out after ${timeoutMs}ms`,
          timedOut: true,
        }),
      );
    }, timeoutMs);
  });

  try {
    const result = await Promise.race([call(controller.signal), deadline]);
    logBoundaryReturn(adapter, operation, Date.now() - start);
    return result;
  } catch (err) {
    const failure =
      err instanceof ExternalOperationFailure
        ? err
        : new ExternalOperationFailure({
            subsystem: adapter.subsystem,
            operation,
            reason: err instanceof Error ? err.message : String(err),
          });
    logBoundaryReturn(adapter, operation, Date.now() - start, failure.message);
    throw failure;
  } finally {
    clearTimeout(timer);
  }
}
