import { randomUUID } from "crypto";
import {
  joinClusterRequestSchema,
  type Cluster,
  type JoinClusterRequest,
  type Node,
  type NodeRole,
} from "@shared/schema";
import {
  DuplicateNodeError,
  NodeNotFoundError,
  NotInitializedError,
  NotLeaderError,
  TokenNotFoundError,
  TokenUsedError,
  ValidationError,
  validationErrorFrom,
} from "../errors";
import type { IClusterStore } from "../storage";
import type { ExternalAdapters, Subsystem, SubsystemConfig } from "../execution/types";
import { runExternalOperation } from "../execution/boundary";
import {
  JOIN_PHASES,
  LEAVE_PHASES,
  PhasePipeline,
  type JoinPhase,
  type LeavePhase,
} from "../orchestration/pipeline";
import { buildSubsystemConfig } from "../orchestration/subsystemConfig";
import { describeToken, type CredentialAuthority } from "./credentialAuthority";

export type NodeLifecycleDeps = {
  role: NodeRole;
  store: IClusterStore;
  authority: CredentialAuthority;
  adapters: ExternalAdapters;
  storageDevice: string;
  externalTimeoutMs: number;
  tokenTtlMs: number;
  heartbeatTimeoutMs: number;
  now?: () => Date;
};

export type JoinResult = {
  nodeId: string;
  status: Node["status"];
  certificate: string;
  privateKey: string;
  caCertificate: string;
  phases: JoinPhase[];
};

export type LeaveResult = {
  nodeId: string;
  phases: LeavePhase[];
};

export type IssuedToken = {
  token: string;
  expiresAt: Date;
};

export type PhaseListener<P> = {
  onPhase?: (phase: P) => void;
};

const JOIN_STEPS: ReadonlyArray<{ subsystem: Subsystem; phase: JoinPhase }> = [
  { subsystem: "compute", phase: "ComputeJoined" },
  { subsystem: "storage", phase: "StorageJoined" },
  { subsystem: "network", phase: "NetworkJoined" },
];

const LEAVE_STEPS: ReadonlyArray<{ subsystem: Subsystem; phase: LeavePhase }> = [
  { subsystem: "compute", phase: "RemovedFromCompute" },
  { subsystem: "storage", phase: "RemovedFromStorage" },
  { subsystem: "network", phase: "RemovedFromNetwork" },
];

export function cordonKey(nodeId: string): string {
  return `placement.cordoned.${nodeId}`;
}

export class NodeLifecycleService {
  /** Tokens held by a join that is still running. */
  private readonly reservedTokens = new Set<string>();
  private readonly now: () => Date;

  constructor(private readonly deps: NodeLifecycleDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  private requireLeader(operation: string): void {
    if (this.deps.role !== "leader") {
      throw new NotLeaderError(operation);
    }
  }

  private requireCluster(): Cluster {
    const cluster = this.deps.store.reads.getCluster();
    if (!cluster) throw new NotInitializedError();
    return cluster;
  }

  private requireCA(cluster: Cluster): string {
    const ca = this.deps.store.reads.getCA(cluster.id);
    if (!ca) throw new Error(`Cluster ${cluster.id} has no certificate authority`);
    return ca.certPem;
  }

  async issueJoinToken(): Promise<IssuedToken> {
    this.requireLeader("issue join token");
    const cluster = this.requireCluster();
    const token = this.deps.authority.generateBootstrapToken(cluster.id);
    const expiresAt = new Date(this.now().getTime() + this.deps.tokenTtlMs);
    this.deps.store.withTransaction((tx) => {
      tx.createToken({ token, clusterId: cluster.id, expiresAt, used: false });
      tx.recordEvent({
        clusterId: cluster.id,
        nodeId: null,
        type: "token.issued",
        message: `Join token ${describeToken(token)} issued, expires ${expiresAt.toISOString()}`,
      });
    });
    console.log(`[lifecycle] Issued join token ${describeToken(token)}`);
    return { token, expiresAt };
  }

  async join(request: JoinClusterRequest, opts: PhaseListener<JoinPhase> = {}): Promise<JoinResult> {
    const { deps } = this;
    this.requireLeader("join node");
    const pipeline = new PhasePipeline<JoinPhase>("join", JOIN_PHASES, (phase, previous) => {
      console.log(`[lifecycle] join ${previous} → ${phase}`);
      opts.onPhase?.(phase);
    });
    opts.onPhase?.(pipeline.current);

    const parsed = joinClusterRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw validationErrorFrom(parsed.error);
    }
    const { token, node_info: nodeInfo } = parsed.data;
    const cluster = this.requireCluster();

    // TokenValidated: the token gates everything else, so nothing about the
    // cluster's members is revealed to a caller without one. Validation and
    // reservation happen in the same tick; a concurrent join with this token
    // sees the reservation.
    const tokenClusterId = deps.store.withTransaction((tx) => tx.validateToken(token, this.now()));
    if (tokenClusterId !== cluster.id) {
      throw new TokenNotFoundError();
    }
    if (this.reservedTokens.has(token)) {
      throw new TokenUsedError();
    }
    this.reservedTokens.add(token);

    try {
      this.assertIdentityFree(cluster.id, nodeInfo.hostname, nodeInfo.ip);
      pipeline.advance("TokenValidated");

      // CertificateIssued
      const ca = deps.store.reads.getCA(cluster.id);
      if (!ca) throw new Error(`Cluster ${cluster.id} has no certificate authority`);
      const issued = await deps.authority.issueNodeCertificate(
        { certPem: ca.certPem, keyPem: ca.keyPem },
        nodeInfo.ip,
        nodeInfo.hostname,
      );
      pipeline.advance("CertificateIssued");

      const config = buildSubsystemConfig(cluster, nodeInfo, ca.certPem, deps.storageDevice);
      for (const step of JOIN_STEPS) {
        const adapter = deps.adapters[step.subsystem];
        await runExternalOperation(
          adapter,
          "join",
          deps.externalTimeoutMs,
          `cluster=${cluster.name} node=${nodeInfo.hostname} ip=${nodeInfo.ip} token=${describeToken(token)}`,
          (signal) => adapter.join(token, config, { signal }),
        );
        pipeline.advance(step.phase);
      }

      // Registered
      const now = this.now();
      const node = deps.store.withTransaction((tx) => {
        tx.consumeToken(token, now);
        const created = tx.createNode({
          id: randomUUID(),
          clusterId: cluster.id,
          hostname: nodeInfo.hostname,
          ip: nodeInfo.ip,
          role: "member",
          status: "joining",
          joinedAt: now,
          lastHeartbeat: null,
        });
        tx.createNodeCertificate({
          id: randomUUID(),
          nodeId: created.id,
          certPem: issued.certPem,
          serial: issued.serial,
          issuedAt: issued.notBefore,
          expiresAt: issued.notAfter,
        });
        tx.recordEvent({
          clusterId: cluster.id,
          nodeId: created.id,
          type: "node.joined",
          message: `Node ${created.hostname} (${created.ip}) joined`,
        });
        return created;
      });
      pipeline.advance("Registered");
      console.log(`[lifecycle] Node ${node.hostname} registered as ${node.id}`);

      return {
        nodeId: node.id,
        status: node.status,
        certificate: issued.certPem,
        privateKey: issued.keyPem,
        caCertificate: ca.certPem,
        phases: pipeline.history.map((record) => record.phase),
      };
    } finally {
      this.reservedTokens.delete(token);
    }
  }

  private assertIdentityFree(clusterId: string, hostname: string, ip: string): void {
    const existing = this.deps.store.reads.findNodesByIdentity(clusterId, hostname, ip);
    for (const node of existing) {
      if (node.hostname === hostname) throw new DuplicateNodeError(`hostname "${hostname}"`);
      if (node.ip === ip) throw new DuplicateNodeError(`ip "${ip}"`);
    }
  }

  /**
   * Health signal: a joining or offline node becomes online. A cordoned node
   * is leaving; its heartbeat is recorded but it stays offline.
   */
  async markOnline(nodeId: string): Promise<Node> {
    this.requireLeader("mark node online");
    const now = this.now();
    return this.deps.store.withTransaction((tx) => {
      const node = tx.getNode(nodeId);
      if (!node) throw new NodeNotFoundError(nodeId);
      if (node.status === "online" || tx.getConfig(cordonKey(nodeId)) !== undefined) {
        return tx.touchHeartbeat(nodeId, now) ?? node;
      }
      const updated = tx.updateNodeStatus(nodeId, "online", now) ?? node;
      tx.recordEvent({
        clusterId: node.clusterId,
        nodeId,
        type: "node.online",
        message: `Node ${node.hostname} is online (was ${node.status})`,
      });
      return updated;
    });
  }

  async recordHeartbeat(nodeId: string): Promise<Node> {
    this.requireLeader("record heartbeat");
    const now = this.now();
    return this.deps.store.withTransaction((tx) => {
      const node = tx.getNode(nodeId);
      if (!node) throw new NodeNotFoundError(nodeId);
      if (node.status !== "offline" || tx.getConfig(cordonKey(nodeId)) !== undefined) {
        return tx.touchHeartbeat(nodeId, now) ?? node;
      }
      const updated = tx.updateNodeStatus(nodeId, "online", now) ?? node;
      tx.recordEvent({
        clusterId: node.clusterId,
        nodeId,
        type: "node.online",
        message: `Node ${node.hostname} is back online`,
      });
      return updated;
    });
  }

  /** Marks every member silent for longer than the heartbeat timeout as offline. */
  async markStaleNodesOffline(now: Date = this.now()): Promise<string[]> {
    this.requireLeader("sweep stale nodes");
    const cluster = this.deps.store.reads.getCluster();
    if (!cluster) return [];
    const cutoff = new Date(now.getTime() - this.deps.heartbeatTimeoutMs);
    const affected = this.deps.store.withTransaction((tx) => {
      const stale = tx.listStaleNodes(cluster.id, cutoff);
      for (const node of stale) {
        tx.updateNodeStatus(node.id, "offline");
        tx.recordEvent({
          clusterId: cluster.id,
          nodeId: node.id,
          type: "node.offline",
          message: `Node ${node.hostname} missed heartbeats since ${(node.lastHeartbeat ?? node.joinedAt).toISOString()}`,
        });
      }
      return stale.map((node) => node.id);
    });
    if (affected.length > 0) {
      console.warn(`[lifecycle] Marked ${affected.length} node(s) offline: ${affected.join(", ")}`);
    }
    return affected;
  }

  /**
   * Drains the node, removes it from every subsystem, then deletes its record.
   * If a removal fails the node stays recorded (cordoned and offline) so the
   * leave can be retried.
   */
  async leave(nodeId: string, opts: PhaseListener<LeavePhase> = {}): Promise<LeaveResult> {
    const { deps } = this;
    this.requireLeader("remove node");
    const cluster = this.requireCluster();
    const node = deps.store.reads.getNode(nodeId);
    if (!node) throw new NodeNotFoundError(nodeId);
    if (node.role === "leader") {
      throw new ValidationError(["the leader node cannot leave the cluster"]);
    }

    const pipeline = new PhasePipeline<LeavePhase>("leave", LEAVE_PHASES, (phase, previous) => {
      console.log(`[lifecycle] leave ${node.hostname} ${previous} → ${phase}`);
      opts.onPhase?.(phase);
    });
    opts.onPhase?.(pipeline.current);

    // Draining
    const drainedAt = this.now();
    deps.store.withTransaction((tx) => {
      tx.setConfig(cordonKey(nodeId), drainedAt.toISOString(), drainedAt);
      tx.updateNodeStatus(nodeId, "offline");
    });
    pipeline.advance("Draining");

    const config: SubsystemConfig = buildSubsystemConfig(cluster, node, this.requireCA(cluster), deps.storageDevice);
    for (const step of LEAVE_STEPS) {
      const adapter = deps.adapters[step.subsystem];
      await runExternalOperation(
        adapter,
        "leave",
        deps.externalTimeoutMs,
        `cluster=${cluster.name} node=${node.hostname} ip=${node.ip}`,
        (signal) => adapter.leave(config, { signal }),
      );
      pipeline.advance(step.phase);
    }

    // Removed
    deps.store.withTransaction((tx) => {
      tx.deleteNode(nodeId);
      tx.deleteConfig(cordonKey(nodeId));
      tx.recordEvent({
        clusterId: cluster.id,
        nodeId,
        type: "node.left",
        message: `Node ${node.hostname} (${node.ip}) left the cluster`,
      });
    });
    pipeline.advance("Removed");
    console.log(`[lifecycle] Node ${node.hostname} (${nodeId}) removed`);

    return { nodeId, phases: pipeline.history.map((record) => record.phase) };
  }
}
