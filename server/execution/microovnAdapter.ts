import { CommandFailedError, type CommandRunner } from "./commandRunner";
import { listsMember } from "./membership";
import type { CallOptions, ExternalOperationAdapter, SubsystemConfig, SubsystemState } from "./types";

export class MicroOvnAdapter implements ExternalOperationAdapter {
  readonly subsystem = "network";
  readonly adapterName = "MicroOvnAdapter";
  readonly requiredTools = ["microovn"];

  constructor(private readonly runner: CommandRunner) {}

  private async listing(signal: AbortSignal): Promise<string | undefined> {
    try {
      const { stdout } = await this.runner.run("microovn", ["status"], { signal });
      return stdout;
    } catch (err) {
      if (err instanceof CommandFailedError) return undefined;
      throw err;
    }
  }

  async status({ signal }: CallOptions): Promise<SubsystemState> {
    return (await this.listing(signal)) === undefined ? "absent" : "ready";
  }

  async bootstrap(_config: SubsystemConfig, opts: CallOptions): Promise<void> {
    if ((await this.status(opts)) === "ready") {
      console.log("[adapter] MicroOVN is already bootstrapped, skipping bootstrap");
      return;
    }
    await this.runner.run("microovn", ["cluster", "bootstrap"], { signal: opts.signal });
  }

  async join(token: string, config: SubsystemConfig, opts: CallOptions): Promise<void> {
    const listing = await this.listing(opts.signal);
    if (listing !== undefined && listsMember(listing, config.nodeHostname)) {
      console.log(`[adapter] MicroOVN already lists ${config.nodeHostname}, skipping join`);
      return;
    }
    await this.runner.run("microovn", ["cluster", "join", token], { signal: opts.signal });
  }

  async leave(config: SubsystemConfig, { signal }: CallOptions): Promise<void> {
    try {
      await this.runner.run("microovn", ["cluster", "remove", config.nodeHostname], { signal });
    } catch (err) {
      if (err instanceof CommandFailedError && /not found/i.test(err.message)) return;
      throw err;
    }
  }
}
