import { CommandFailedError, type CommandRunner } from "./commandRunner";
import { listsMember } from "./membership";
import type { CallOptions, ExternalOperationAdapter, SubsystemConfig, SubsystemState } from "./types";

export class MicroCephAdapter implements ExternalOperationAdapter {
  readonly subsystem = "storage";
  readonly adapterName = "MicroCephAdapter";
  readonly requiredTools = ["microceph"];

  constructor(private readonly runner: CommandRunner) {}

  private async listing(signal: AbortSignal): Promise<string | undefined> {
    try {
      const { stdout } = await this.runner.run("microceph", ["status"], { signal });
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
      console.log("[adapter] MicroCeph is already bootstrapped, skipping bootstrap");
      return;
    }
    await this.runner.run("microceph", ["cluster", "bootstrap"], { signal: opts.signal });
    await this.runner.run("microceph", ["disk", "add", config.storageDevice], { signal: opts.signal });
  }

  async join(token: string, config: SubsystemConfig, opts: CallOptions): Promise<void> {
    const listing = await this.listing(opts.signal);
    if (listing !== undefined && listsMember(listing, config.nodeHostname)) {
      console.log(`[adapter] MicroCeph already lists ${config.nodeHostname}, skipping join`);
      return;
    }
    await this.runner.run("microceph", ["cluster", "join", token], { signal: opts.signal });
    await this.runner.run("microceph", ["disk", "add", config.storageDevice], { signal: opts.signal });
  }

  async leave(config: SubsystemConfig, { signal }: CallOptions): Promise<void> {
    try {
      await this.runner.run("microceph", ["cluster", "remove", config.nodeHostname], { signal });
    } catch (err) {
      if (err instanceof CommandFailedError && /not found/i.test(err.message)) return;
      throw err;
    }
  }
}
