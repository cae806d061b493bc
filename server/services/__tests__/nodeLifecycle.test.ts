import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "fs";
import path from "path";
import type { OpenedDatabase } from "../../db";
import type { DatabaseClusterStore } from "../../storage";
import { BootstrapOrchestrator, type BootstrapResult } from "../bootstrapOrchestrator";
import { NodeLifecycleService, cordonKey, type NodeLifecycleDeps } from "../nodeLifecycleService";
import { verifyNodeCertificate } from "../credentialAuthority";
import { NodeStateFile } from "../../nodeState";
import { NoopAdapter } from "../../execution/noopAdapter";
import { JOIN_PHASES, LEAVE_PHASES } from "../../orchestration/pipeline";
import {
  DuplicateNodeError,
  ExternalOperationFailure,
  NodeNotFoundError,
  NotInitializedError,
  NotLeaderError,
  TokenExpiredError,
  TokenNotFoundError,
  TokenUsedError,
  ValidationError,
} from "../../errors";
import { FakeHostProbe, createTempDir, createTestAuthority, createTestStore } from "../../__tests__/fixtures";

const HOUR = 60 * 60 * 1000;
const NODE_A = { hostname: "node-a", ip: "10.0.0.21" };
const NODE_B = { hostname: "node-b", ip: "10.0.0.22" };

let database: OpenedDatabase;
let store: DatabaseClusterStore;
let tempDir: string;
let adapters: { compute: NoopAdapter; storage: NoopAdapter; network: NoopAdapter };

function createLifecycle(overrides: Partial<NodeLifecycleDeps> = {}) {
  return new NodeLifecycleService({
    role: "leader",
    store,
    authority: createTestAuthority(),
    adapters,
    storageDevice: "/dev/sdb",
    externalTimeoutMs: 5000,
    tokenTtlMs: 24 * HOUR,
    heartbeatTimeoutMs: 90_000,
    ...overrides,
  });
}

function bootstrapCluster(): Promise<BootstrapResult> {
  return new BootstrapOrchestrator({
    role: "leader",
    store,
    authority: createTestAuthority(),
    adapters,
    hostProbe: new FakeHostProbe(),
    nodeState: new NodeStateFile(path.join(tempDir, "state.yaml")),
    hostname: "leader-1",
    storageDevice: "/dev/sdb",
    externalTimeoutMs: 5000,
    tokenTtlMs: 24 * HOUR,
  }).bootstrap({ name: "demo-cluster", advertise_address: "10.0.0.5:8443" });
}

beforeEach(() => {
  ({ database, store } = createTestStore());
  tempDir = createTempDir();
  adapters = {
    compute: new NoopAdapter("compute"),
    storage: new NoopAdapter("storage"),
    network: new NoopAdapter("network"),
  };
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "error").mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
  database.close();
  fs.rmSync(tempDir, { recursive: true, force: true });
});

describe("NodeLifecycleService: join", () => {
  let cluster: BootstrapResult;

  beforeEach(async () => {
    cluster = await bootstrapCluster();
  });

  it("registers the node as joining and returns credentials from the cluster CA", async () => {
    const result = await createLifecycle().join({ token: cluster.token, node_info: NODE_A });

    expect(result.status).toBe("joining");
    expect(result.phases).toEqual([...JOIN_PHASES]);
    expect(result.caCertificate).toBe(store.reads.getCA(cluster.clusterId)?.certPem);
    expect(verifyNodeCertificate(result.caCertificate, result.certificate)).toBe(true);
    expect(result.privateKey).toContain("PRIVATE KEY");

    const node = store.reads.getNode(result.nodeId);
    expect(node).toMatchObject({ hostname: "node-a", ip: "10.0.0.21", role: "member", status: "joining" });
    expect(node?.lastHeartbeat).toBeNull();
    expect(store.reads.listNodeCertificates(result.nodeId)).toHaveLength(1);
    expect(store.reads.getToken(cluster.token)?.used).toBe(true);
    expect(store.reads.listEvents(cluster.clusterId)[0].type).toBe("node.joined");
  });

  it("joins compute, then storage, then network", async () => {
    const compute = vi.spyOn(adapters.compute, "join");
    const storage = vi.spyOn(adapters.storage, "join");
    const network = vi.spyOn(adapters.network, "join");

    await createLifecycle().join({ token: cluster.token, node_info: NODE_A });

    expect(compute).toHaveBeenCalledWith(cluster.token, expect.objectContaining({ nodeHostname: "node-a" }), expect.anything());
    expect(compute.mock.invocationCallOrder[0]).toBeLessThan(storage.mock.invocationCallOrder[0]);
    expect(storage.mock.invocationCallOrder[0]).toBeLessThan(network.mock.invocationCallOrder[0]);
  });

  it("rejects a reused token", async () => {
    const lifecycle = createLifecycle();
    await lifecycle.join({ token: cluster.token, node_info: NODE_A });

    await expect(lifecycle.join({ token: cluster.token, node_info: NODE_B })).rejects.toBeInstanceOf(TokenUsedError);
    expect(store.reads.countNodes(cluster.clusterId)).toBe(2);
  });

  it("rejects an unknown token", async () => {
    await expect(
      createLifecycle().join({ token: "mcloud-00000000-AAAAAAAAAAAAAAAA", node_info: NODE_A }),
    ).rejects.toBeInstanceOf(TokenNotFoundError);
  });

  it("rejects an expired token and records nothing", async () => {
    const lifecycle = createLifecycle({ now: () => new Date(Date.now() + 25 * HOUR) });

    await expect(lifecycle.join({ token: cluster.token, node_info: NODE_A })).rejects.toBeInstanceOf(TokenExpiredError);
    expect(store.reads.countNodes(cluster.clusterId)).toBe(1);
    expect(adapters.compute.calls.filter((call) => call.operation === "join")).toEqual([]);
  });

  it("lets only one of two concurrent joins spend a token", async () => {
    const lifecycle = createLifecycle();
    const outcomes = await Promise.allSettled([
      lifecycle.join({ token: cluster.token, node_info: NODE_A }),
      lifecycle.join({ token: cluster.token, node_info: NODE_B }),
    ]);

    expect(outcomes.map((outcome) => outcome.status)).toEqual(["fulfilled", "rejected"]);
    const rejected = outcomes[1];
    expect(rejected.status === "rejected" && rejected.reason).toBeInstanceOf(TokenUsedError);
    expect(store.reads.countNodes(cluster.clusterId)).toBe(2);
  });

  it("rejects a hostname that is already registered without spending the token", async () => {
    const lifecycle = createLifecycle();
    await lifecycle.join({ token: cluster.token, node_info: NODE_A });
    const { token } = await lifecycle.issueJoinToken();

    await expect(
      lifecycle.join({ token, node_info: { hostname: "node-a", ip: "10.0.0.30" } }),
    ).rejects.toBeInstanceOf(DuplicateNodeError);
    expect(store.reads.getToken(token)?.used).toBe(false);
  });

  it("checks the token before revealing whether a hostname is taken", async () => {
    await expect(
      createLifecycle().join({ token: "bogus", node_info: { hostname: "leader-1", ip: "10.9.9.9" } }),
    ).rejects.toBeInstanceOf(TokenNotFoundError);

    const later = createLifecycle({ now: () => new Date(Date.now() + 25 * HOUR) });
    await expect(
      later.join({ token: cluster.token, node_info: { hostname: "leader-1", ip: "10.9.9.9" } }),
    ).rejects.toBeInstanceOf(TokenExpiredError);
  });

  it("rejects the leader's address as a duplicate", async () => {
    await expect(
      createLifecycle().join({ token: cluster.token, node_info: { hostname: "node-c", ip: "10.0.0.5" } }),
    ).rejects.toThrow(/ip "10.0.0.5"/);
  });

  it("keeps the token when a subsystem join fails", async () => {
    vi.spyOn(adapters.storage, "join").mockRejectedValueOnce(new Error("microceph join refused"));
    const lifecycle = createLifecycle();

    const failure = await lifecycle.join({ token: cluster.token, node_info: NODE_A }).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(ExternalOperationFailure);
    expect(failure).toMatchObject({ subsystem: "storage", operation: "join" });
    expect(store.reads.getToken(cluster.token)?.used).toBe(false);
    expect(store.reads.countNodes(cluster.clusterId)).toBe(1);

    await expect(lifecycle.join({ token: cluster.token, node_info: NODE_A })).resolves.toMatchObject({
      status: "joining",
    });
  });

  it("validates the request body", async () => {
    await expect(
      createLifecycle().join({ token: cluster.token, node_info: { hostname: "node-a", ip: "not-an-ip" } }),
    ).rejects.toMatchObject({ issues: ["node_info.ip: ip must be an IPv4 or IPv6 address"] });
  });

  it("refuses to join on a member", async () => {
    await expect(
      createLifecycle({ role: "member" }).join({ token: cluster.token, node_info: NODE_A }),
    ).rejects.toBeInstanceOf(NotLeaderError);
  });
});

describe("NodeLifecycleService: tokens", () => {
  it("requires a cluster before issuing tokens", async () => {
    await expect(createLifecycle().issueJoinToken()).rejects.toBeInstanceOf(NotInitializedError);
  });

  it("issues a fresh token that expires after the configured lifetime", async () => {
    const cluster = await bootstrapCluster();
    const now = new Date("2026-03-01T12:00:00.000Z");

    const issued = await createLifecycle({ now: () => now, tokenTtlMs: 2 * HOUR }).issueJoinToken();

    expect(issued.token).toMatch(new RegExp(`^mcloud-${cluster.clusterId.slice(0, 8)}-`));
    expect(issued.token).not.toBe(cluster.token);
    expect(issued.expiresAt.toISOString()).toBe("2026-03-01T14:00:00.000Z");
    expect(store.reads.getToken(issued.token)?.expiresAt.toISOString()).toBe("2026-03-01T14:00:00.000Z");
    expect(store.reads.listEvents(cluster.clusterId)[0].type).toBe("token.issued");
  });
});

describe("NodeLifecycleService: health", () => {
  let cluster: BootstrapResult;
  let nodeId: string;

  beforeEach(async () => {
    cluster = await bootstrapCluster();
    ({ nodeId } = await createLifecycle().join({ token: cluster.token, node_info: NODE_A }));
  });

  it("marks a joining node online", async () => {
    const node = await createLifecycle().markOnline(nodeId);

    expect(node.status).toBe("online");
    expect(node.lastHeartbeat).toBeInstanceOf(Date);
    expect(store.reads.listEvents(cluster.clusterId)[0].type).toBe("node.online");
  });

  it("reports an unknown node", async () => {
    await expect(createLifecycle().markOnline("missing")).rejects.toBeInstanceOf(NodeNotFoundError);
  });

  it("marks silent members offline and leaves the leader alone", async () => {
    const lifecycle = createLifecycle({ heartbeatTimeoutMs: 1000 });
    await lifecycle.markOnline(nodeId);

    const affected = await lifecycle.markStaleNodesOffline(new Date(Date.now() + 10_000));

    expect(affected).toEqual([nodeId]);
    expect(store.reads.getNode(nodeId)?.status).toBe("offline");
    expect(store.reads.getNode(cluster.leader.id)?.status).toBe("online");
    expect(store.reads.listEvents(cluster.clusterId)[0].type).toBe("node.offline");
  });

  it("does not sweep a node that heartbeats in time", async () => {
    const lifecycle = createLifecycle({ heartbeatTimeoutMs: 60_000 });
    await lifecycle.recordHeartbeat(nodeId);

    expect(await lifecycle.markStaleNodesOffline(new Date(Date.now() + 1000))).toEqual([]);
  });

  it("brings an offline node back with a heartbeat", async () => {
    const lifecycle = createLifecycle({ heartbeatTimeoutMs: 1000 });
    await lifecycle.markStaleNodesOffline(new Date(Date.now() + 10_000));

    const node = await lifecycle.recordHeartbeat(nodeId);
    expect(node.status).toBe("online");
  });
});

describe("NodeLifecycleService: leave", () => {
  let cluster: BootstrapResult;
  let nodeId: string;

  beforeEach(async () => {
    cluster = await bootstrapCluster();
    ({ nodeId } = await createLifecycle().join({ token: cluster.token, node_info: NODE_A }));
  });

  it("removes the node from every subsystem and deletes its records", async () => {
    const result = await createLifecycle().leave(nodeId);

    expect(result.phases).toEqual([...LEAVE_PHASES]);
    expect(adapters.compute.calls.at(-1)).toEqual({ operation: "leave", nodeHostname: "node-a" });
    expect(adapters.storage.calls.at(-1)).toEqual({ operation: "leave", nodeHostname: "node-a" });
    expect(adapters.network.calls.at(-1)).toEqual({ operation: "leave", nodeHostname: "node-a" });
    expect(store.reads.getNode(nodeId)).toBeUndefined();
    expect(store.reads.listNodeCertificates(nodeId)).toEqual([]);
    expect(store.reads.getConfig(cordonKey(nodeId))).toBeUndefined();
    expect(store.reads.listEvents(cluster.clusterId)[0].type).toBe("node.left");
  });

  it("keeps the node cordoned and offline when a removal fails, and can be retried", async () => {
    vi.spyOn(adapters.storage, "leave").mockRejectedValueOnce(new Error("osd still in use"));
    const lifecycle = createLifecycle();

    const failure = await lifecycle.leave(nodeId).catch((err: unknown) => err);

    expect(failure).toBeInstanceOf(ExternalOperationFailure);
    expect(store.reads.getNode(nodeId)?.status).toBe("offline");
    expect(store.reads.getConfig(cordonKey(nodeId))).toBeDefined();
    expect(adapters.network.calls.filter((call) => call.operation === "leave")).toEqual([]);

    await lifecycle.leave(nodeId);
    expect(store.reads.getNode(nodeId)).toBeUndefined();
  });

  it("keeps a cordoned node offline when it reports in", async () => {
    vi.spyOn(adapters.storage, "leave").mockRejectedValueOnce(new Error("osd still in use"));
    const lifecycle = createLifecycle();
    await lifecycle.leave(nodeId).catch(() => undefined);

    const beat = await lifecycle.recordHeartbeat(nodeId);
    expect(beat.status).toBe("offline");
    expect(beat.lastHeartbeat).toBeInstanceOf(Date);
    expect((await lifecycle.markOnline(nodeId)).status).toBe("offline");
    expect(store.reads.listEvents(cluster.clusterId).map((event) => event.type)).not.toContain("node.online");
  });

  it("refuses to remove the leader", async () => {
    await expect(createLifecycle().leave(cluster.leader.id)).rejects.toBeInstanceOf(ValidationError);
    expect(store.reads.getNode(cluster.leader.id)?.status).toBe("online");
  });

  it("reports an unknown node", async () => {
    await expect(createLifecycle().leave("missing")).rejects.toBeInstanceOf(NodeNotFoundError);
  });
});
