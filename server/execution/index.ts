export type {
  CallOptions,
  ExternalAdapters,
  ExternalOperationAdapter,
  Subsystem,
  SubsystemConfig,
  SubsystemState,
} from "./types";
export { SUBSYSTEMS } from "./types";
export { createAdapters, createRealAdapters, requiredTools } from "./adapterFactory";
export { NoopAdapter, createNoopAdapters } from "./noopAdapter";
export type { RecordedCall } from "./noopAdapter";
export { runExternalOperation } from "./boundary";
export { LocalHostProbe } from "./hostProbe";
export type { HostProbe } from "./hostProbe";
export { ExecFileCommandRunner, CommandFailedError } from "./commandRunner";
export type { CommandRunner, CommandResult, RunOptions } from "./commandRunner";
