import type { ExternalOperationName } from "../errors";
import type { ExternalOperationAdapter } from "./types";

export function logBoundaryCrossing(
  adapter: ExternalOperationAdapter,
  operation: ExternalOperationName,
  detail: string,
): void {
  console.log(`[control-plane→${adapter.subsystem}] ${operation} via ${adapter.adapterName} | ${detail}`);
}

export function logBoundaryReturn(
  adapter: ExternalOperationAdapter,
  operation: ExternalOperationName,
  durationMs: number,
  error?: string,
): void {
  const status = error === undefined ? "SUCCESS" : "FAILURE";
  const errorInfo = error === undefined ? "" : ` error="${error}"`;
  console.log(
    `[${adapter.subsystem}→control-plane] ${operation} via ${adapter.adapterName} | status=${status}${errorInfo} duration=${durationMs}ms`,
  );
}
