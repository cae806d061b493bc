import { stringify } from "yaml";
import { CommandFailedError, type CommandRunner } from "./commandRunner";
import { listsMember } from "./membership";
import type { CallOptions, ExternalOperationAdapter, SubsystemConfig, SubsystemState } from "./types";

type Preseed = {
  config: Record<string, string>;
  cluster: {
    enabled: boolean;
    server_name: string;
    cluster_address: string;
    cluster_certificate?: string;
    cluster_token?: string;
  };
};

function formatAddress(host: string, port: number): string {
  return host.includes(":") ? `[${host}]:${port}` : `${host}:${port}`;
}

export function bootstrapPreseed(config: SubsystemConfig): Preseed {
  const address = formatAddress(config.advertiseHost, config.advertisePort);
  return {
    config: { "core.https_address": address },
    cluster: {
      enabled: true,
      server_name: config.nodeHostname,
      cluster_address: address,
    },
  };
}

export function joinPreseed(token: string, config: SubsystemConfig): Preseed {
  return {
    config: { "core.https_address": formatAddress(config.nodeIp, config.advertisePort) },
    cluster: {
      enabled: true,
      server_name: config.nodeHostname,
      cluster_address: formatAddress(config.advertiseHost, config.advertisePort),
      cluster_certificate: config.caCertPem,
      cluster_token: token,
    },
  };
}

/** Compute subsystem, driven through `lxd init --preseed` and `lxc cluster`. */
export class LxdAdapter implements ExternalOperationAdapter {
  readonly subsystem = "compute";
  readonly adapterName = "LxdAdapter";
  readonly requiredTools = ["lxd", "lxc"];

  constructor(private readonly runner: CommandRunner) {}

  private async listing(signal: AbortSignal): Promise<string | undefined> {
    try {
      const { stdout } = await this.runner.run("lxc", ["cluster", "list", "--format", "csv"], { signal });
      return stdout;
    } catch (err) {
      if (err instanceof CommandFailedError) return undefined;
      throw err;
    }
  }

  async status({ signal }: CallOptions): Promise<SubsystemState> {
    return (await this.listing(signal)) === undefined ? "absent" : "ready";
  }

  async bootstrap(config: SubsystemConfig, opts: CallOptions): Promise<void> {
    if ((await this.status(opts)) === "ready") {
      console.log("[adapter] LXD is already clustered, skipping bootstrap");
      return;
    }
    await this.runner.run("lxd", ["init", "--preseed"], {
      signal: opts.signal,
      input: stringify(bootstrapPreseed(config)),
    });
  }

  async join(token: string, config: SubsystemConfig, opts: CallOptions): Promise<void> {
    const listing = await this.listing(opts.signal);
    if (listing !== undefined && listsMember(listing, config.nodeHostname)) {
      console.log(`[adapter] LXD already lists ${config.nodeHostname}, skipping join`);
      return;
    }
    await this.runner.run("lxd", ["init", "--preseed"], {
      signal: opts.signal,
      input: stringify(joinPreseed(token, config)),
    });
  }

  async leave(config: SubsystemConfig, { signal }: CallOptions): Promise<void> {
    try {
      await this.runner.run("lxc", ["cluster", "remove", config.nodeHostname, "--force", "--yes"], { signal });
    } catch (err) {
      if (err instanceof CommandFailedError && /not found/i.test(err.message)) return;
      throw err;
    }
  }
}
