import type { AdapterType } from "../config";
import { ExecFileCommandRunner, type CommandRunner } from "./commandRunner";
import { LxdAdapter } from "./lxdAdapter";
import { MicroCephAdapter } from "./microcephAdapter";
import { MicroOvnAdapter } from "./microovnAdapter";
import { createNoopAdapters } from "./noopAdapter";
import type { ExternalAdapters } from "./types";

export function createRealAdapters(runner: CommandRunner = new ExecFileCommandRunner()): ExternalAdapters {
  return {
    compute: new LxdAdapter(runner),
    storage: new MicroCephAdapter(runner),
    network: new MicroOvnAdapter(runner),
  };
}

/** Chosen once at start-up; call sites only ever see the ExternalAdapters interface. */
export function createAdapters(adapterType: AdapterType): ExternalAdapters {
  const adapters = adapterType === "noop" ? createNoopAdapters() : createRealAdapters();
  const names = Object.values(adapters)
    .map((adapter) => adapter.adapterName)
    .join(", ");
  console.log(`[adapter] Using ${names} (ADAPTER=${adapterType})`);
  return adapters;
}

export function requiredTools(adapters: ExternalAdapters): string[] {
  const tools = new Set<string>();
  for (const adapter of Object.values(adapters)) {
    for (const tool of adapter.requiredTools) tools.add(tool);
  }
  return [...tools];
}
