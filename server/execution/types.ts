export const SUBSYSTEMS = ["compute", "storage", "network"] as const;
export type Subsystem = (typeof SUBSYSTEMS)[number];

export type SubsystemState = "ready" | "absent";

/** Everything a subsystem needs to bootstrap, join or remove the local node. */
export type SubsystemConfig = {
  clusterId: string;
  clusterName: string;
  advertiseHost: string;
  advertisePort: number;
  nodeHostname: string;
  nodeIp: string;
  storageDevice: string;
  caCertPem: string;
};

export type CallOptions = {
  signal: AbortSignal;
};

/**
 * Boundary to an independently owned subsystem. Every operation must be safe
 * to call again with the same effective config: a subsystem that is already
 * bootstrapped, joined or absent reports success.
 */
export interface ExternalOperationAdapter {
  readonly subsystem: Subsystem;
  readonly adapterName: string;
  /** Executables that must be on PATH before this adapter can be used. */
  readonly requiredTools: readonly string[];
  bootstrap(config: SubsystemConfig, opts: CallOptions): Promise<void>;
  join(token: string, config: SubsystemConfig, opts: CallOptions): Promise<void>;
  leave(config: SubsystemConfig, opts: CallOptions): Promise<void>;
  status(opts: CallOptions): Promise<SubsystemState>;
}

export type ExternalAdapters = Record<Subsystem, ExternalOperationAdapter>;
