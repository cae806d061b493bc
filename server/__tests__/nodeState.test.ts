import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import path from "path";
import { NODE_STATE_VERSION, NodeStateFile } from "../nodeState";
import { NodeStateConflictError } from "../errors";
import { createTempDir } from "./fixtures";

const STATE = {
  node: { id: "n1", hostname: "leader-1", ip: "10.0.0.5", role: "leader", status: "online" },
  cluster: { id: "c1", name: "demo-cluster", advertise_address: "10.0.0.5:8443" },
} as const;

let dir: string;
let file: NodeStateFile;

beforeEach(() => {
  dir = createTempDir();
  file = new NodeStateFile(path.join(dir, "nested", "state.yaml"));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe("NodeStateFile", () => {
  it("reports an absent file as uninitialized", async () => {
    expect(await file.load()).toBeUndefined();
    expect(await file.isInitialized()).toBe(false);
  });

  it("writes the document once and reads it back", async () => {
    const at = new Date("2026-03-01T12:00:00.000Z");
    await file.initialize({ node: { ...STATE.node }, cluster: { ...STATE.cluster } }, at);

    expect(await file.load()).toEqual({
      version: NODE_STATE_VERSION,
      node: { ...STATE.node, initialized_at: "2026-03-01T12:00:00.000Z" },
      cluster: STATE.cluster,
      flags: { initialized: true },
    });
    expect(fs.statSync(file.filePath).mode & 0o777).toBe(0o600);
    expect(fs.existsSync(`${file.filePath}.tmp`)).toBe(false);
  });

  it("refuses to overwrite an initialized file", async () => {
    await file.initialize({ node: { ...STATE.node }, cluster: { ...STATE.cluster } });
    await expect(
      file.initialize({ node: { ...STATE.node, id: "n2" }, cluster: { ...STATE.cluster } }),
    ).rejects.toBeInstanceOf(NodeStateConflictError);
    expect((await file.load())?.node.id).toBe("n1");
  });

  it("allows a new initialization after a reset", async () => {
    await file.initialize({ node: { ...STATE.node }, cluster: { ...STATE.cluster } });

    expect(await file.reset()).toBe(true);
    expect(await file.reset()).toBe(false);

    await file.initialize({ node: { ...STATE.node, id: "n2" }, cluster: { ...STATE.cluster } });
    expect((await file.load())?.node.id).toBe("n2");
  });

  it("writes credentials beside the state file and removes them on reset", async () => {
    await file.initialize({ node: { ...STATE.node }, cluster: { ...STATE.cluster } });
    await file.writeCredentials({ certificate: "test-cert", privateKey: "test-key", caCertificate: "test-ca" });

    const paths = file.credentialPaths;
    expect(paths.privateKey).toBe(path.join(dir, "nested", "node.key"));
    expect(fs.readFileSync(paths.certificate, "utf-8")).toBe("test-cert");
    expect(fs.readFileSync(paths.caCertificate, "utf-8")).toBe("test-ca");
    expect(fs.statSync(paths.privateKey).mode & 0o777).toBe(0o600);

    await file.reset();
    expect(Object.values(paths).map((p) => fs.existsSync(p))).toEqual([false, false, false]);
  });

  it("rejects a malformed file", async () => {
    fs.mkdirSync(path.dirname(file.filePath), { recursive: true });
    fs.writeFileSync(file.filePath, "version: 1.0.0\nnode: {}\n");
    await expect(file.load()).rejects.toThrow(/is malformed/);
  });
});
