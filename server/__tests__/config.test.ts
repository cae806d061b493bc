import { describe, it, expect } from "vitest";
import { ConfigError, loadConfig } from "../config";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({ NODE_HOSTNAME: "leader-1" });

    expect(config).toEqual({
      port: 9028,
      host: "0.0.0.0",
      memberApiPort: 9443,
      role: "leader",
      hostname: "leader-1",
      dbPath: "./data/mcloud.db",
      statePath: "./data/state.yaml",
      adapter: "real",
      storageDevice: "/dev/sdb",
      externalTimeoutMs: 120_000,
      tokenTtlMs: 24 * 60 * 60 * 1000,
      heartbeatTimeoutMs: 90_000,
    });
  });

  it("coerces numbers and normalizes the adapter name", () => {
    const config = loadConfig({ PORT: "8080", ADAPTER: "NOOP", TOKEN_TTL_HOURS: "2", NODE_ROLE: "member" });

    expect(config.port).toBe(8080);
    expect(config.adapter).toBe("noop");
    expect(config.tokenTtlMs).toBe(2 * 60 * 60 * 1000);
    expect(config.role).toBe("member");
  });

  it("treats blank values as unset", () => {
    expect(loadConfig({ PORT: "", ADAPTER: "  " }).port).toBe(9028);
  });

  it("lists every invalid variable", () => {
    expect(() => loadConfig({ PORT: "70000", ADAPTER: "docker" })).toThrow(ConfigError);
    expect(() => loadConfig({ PORT: "70000", ADAPTER: "docker" })).toThrow(/PORT: .*; ADAPTER: /);
  });
});
