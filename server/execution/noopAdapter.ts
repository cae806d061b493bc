import type { ExternalOperationName } from "../errors";
import type {
  CallOptions,
  ExternalAdapters,
  ExternalOperationAdapter,
  Subsystem,
  SubsystemConfig,
  SubsystemState,
} from "./types";

export type RecordedCall = {
  operation: ExternalOperationName;
  nodeHostname?: string;
};

/** Succeeds without touching the host and remembers what it was asked to do. */
export class NoopAdapter implements ExternalOperationAdapter {
  readonly adapterName: string;
  readonly requiredTools: readonly string[] = [];
  readonly calls: RecordedCall[] = [];
  private state: SubsystemState = "absent";

  constructor(readonly subsystem: Subsystem) {
    this.adapterName = `Noop${subsystem[0].toUpperCase()}${subsystem.slice(1)}Adapter`;
  }

  async status(_opts: CallOptions): Promise<SubsystemState> {
    this.calls.push({ operation: "status" });
    return this.state;
  }

  async bootstrap(config: SubsystemConfig, _opts: CallOptions): Promise<void> {
    this.calls.push({ operation: "bootstrap", nodeHostname: config.nodeHostname });
    this.state = "ready";
  }

  async join(_token: string, config: SubsystemConfig, _opts: CallOptions): Promise<void> {
    this.calls.push({ operation: "join", nodeHostname: config.nodeHostname });
  }

  async leave(config: SubsystemConfig, _opts: CallOptions): Promise<void> {
    this.calls.push({ operation: "leave", nodeHostname: config.nodeHostname });
  }
}

export function createNoopAdapters(): ExternalAdapters {
  return {
    compute: new NoopAdapter("compute"),
    storage: new NoopAdapter("storage"),
    network: new NoopAdapter("network"),
  };
}
