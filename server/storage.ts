import { and, asc, desc, eq, like, lt, ne, or, sql } from "drizzle-orm";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";
import type { RunResult } from "better-sqlite3";
import {
  clusters,
  nodes,
  certificateAuthorities,
  bootstrapTokens,
  nodeCertificates,
  events,
  kvStore,
  type Cluster,
  type InsertCluster,
  type ClusterState,
  type Node,
  type InsertNode,
  type NodeRole,
  type NodeStatus,
  type CertificateAuthority,
  type InsertCertificateAuthority,
  type BootstrapToken,
  type InsertBootstrapToken,
  type NodeCertificate,
  type InsertNodeCertificate,
  type ClusterEvent,
  type InsertClusterEvent,
  type KVEntry,
} from "@shared/schema";
import {
  AlreadyInitializedError,
  DuplicateNodeError,
  NotLeaderError,
  TokenExpiredError,
  TokenNotFoundError,
  TokenUsedError,
} from "./errors";

type Executor = BaseSQLiteDatabase<"sync", RunResult>;

function constraintFailure(err: unknown): string | undefined {
  let current: unknown = err;
  while (current instanceof Error) {
    if (current.message.includes("constraint failed")) return current.message;
    current = current.cause;
  }
  return undefined;
}

/**
 * Read-only view of the cluster state. Bound either to the root connection
 * or, through {@link ClusterRepository}, to an open transaction.
 */
export class ClusterReader {
  constructor(protected readonly exec: Executor) {}

  countClusters(): number {
    const row = this.exec.select({ n: sql<number>`count(*)` }).from(clusters).get();
    return row?.n ?? 0;
  }

  getCluster(): Cluster | undefined {
    return this.exec.select().from(clusters).limit(1).get();
  }

  getClusterByName(name: string): Cluster | undefined {
    return this.exec.select().from(clusters).where(eq(clusters.name, name)).get();
  }

  getNode(id: string): Node | undefined {
    return this.exec.select().from(nodes).where(eq(nodes.id, id)).get();
  }

  listNodes(clusterId: string): Node[] {
    return this.exec
      .select()
      .from(nodes)
      .where(eq(nodes.clusterId, clusterId))
      .orderBy(asc(nodes.joinedAt), asc(nodes.hostname))
      .all();
  }

  countNodes(clusterId: string): number {
    const row = this.exec
      .select({ n: sql<number>`count(*)` })
      .from(nodes)
      .where(eq(nodes.clusterId, clusterId))
      .get();
    return row?.n ?? 0;
  }

  findNodesByIdentity(clusterId: string, hostname: string, ip: string): Node[] {
    return this.exec
      .select()
      .from(nodes)
      .where(and(eq(nodes.clusterId, clusterId), or(eq(nodes.hostname, hostname), eq(nodes.ip, ip))))
      .all();
  }

  getCA(clusterId: string): CertificateAuthority | undefined {
    return this.exec
      .select()
      .from(certificateAuthorities)
      .where(eq(certificateAuthorities.clusterId, clusterId))
      .get();
  }

  getToken(token: string): BootstrapToken | undefined {
    return this.exec.select().from(bootstrapTokens).where(eq(bootstrapTokens.token, token)).get();
  }

  /**
   * Returns the cluster id the token belongs to. Expiry is checked before
   * use so an expired token reports TokenExpired even when it was never used.
   */
  validateToken(token: string, now: Date = new Date()): string {
    const record = this.getToken(token);
    if (!record) {
      throw new TokenNotFoundError();
    }
    if (now.getTime() > record.expiresAt.getTime()) {
      throw new TokenExpiredError(record.expiresAt);
    }
    if (record.used) {
      throw new TokenUsedError();
    }
    return record.clusterId;
  }

  listNodeCertificates(nodeId: string): NodeCertificate[] {
    return this.exec
      .select()
      .from(nodeCertificates)
      .where(eq(nodeCertificates.nodeId, nodeId))
      .orderBy(desc(nodeCertificates.issuedAt))
      .all();
  }

  getConfig(key: string): string | undefined {
    return this.exec.select().from(kvStore).where(eq(kvStore.key, key)).get()?.value;
  }

  listConfig(prefix?: string): KVEntry[] {
    const query = this.exec.select().from(kvStore);
    if (prefix !== undefined) {
      return query.where(like(kvStore.key, `${prefix}%`)).orderBy(asc(kvStore.key)).all();
    }
    return query.orderBy(asc(kvStore.key)).all();
  }

  listEvents(clusterId: string, limit = 100): ClusterEvent[] {
    return this.exec
      .select()
      .from(events)
      .where(eq(events.clusterId, clusterId))
      .orderBy(desc(events.createdAt), desc(events.id))
      .limit(limit)
      .all();
  }
}

/**
 * Writer bound to one transaction. Only handed out by
 * {@link DatabaseClusterStore.withTransaction}.
 */
export class ClusterRepository extends ClusterReader {
  createCluster(data: InsertCluster): Cluster {
    try {
      const now = new Date();
      return this.exec
        .insert(clusters)
        .values({ ...data, createdAt: now, updatedAt: now })
        .returning()
        .get();
    } catch (err) {
      const failure = constraintFailure(err);
      if (failure && (failure.includes("clusters.singleton") || failure.includes("clusters.name"))) {
        throw new AlreadyInitializedError("a cluster record was committed concurrently");
      }
      throw err;
    }
  }

  updateClusterState(id: string, state: ClusterState): Cluster | undefined {
    return this.exec
      .update(clusters)
      .set({ state, updatedAt: new Date() })
      .where(eq(clusters.id, id))
      .returning()
      .get();
  }

  createNode(data: InsertNode): Node {
    try {
      return this.exec
        .insert(nodes)
        .values({ ...data, updatedAt: new Date() })
        .returning()
        .get();
    } catch (err) {
      const failure = constraintFailure(err);
      if (failure?.includes("nodes.hostname")) {
        throw new DuplicateNodeError(`hostname "${data.hostname}"`);
      }
      if (failure?.includes("nodes.ip")) {
        throw new DuplicateNodeError(`ip "${data.ip}"`);
      }
      throw err;
    }
  }

  updateNodeStatus(id: string, status: NodeStatus, heartbeatAt?: Date): Node | undefined {
    const updates: Partial<Node> = { status, updatedAt: new Date() };
    if (heartbeatAt !== undefined) updates.lastHeartbeat = heartbeatAt;
    return this.exec.update(nodes).set(updates).where(eq(nodes.id, id)).returning().get();
  }

  touchHeartbeat(id: string, at: Date): Node | undefined {
    return this.exec
      .update(nodes)
      .set({ lastHeartbeat: at, updatedAt: at })
      .where(eq(nodes.id, id))
      .returning()
      .get();
  }

  /** Non-leader nodes that are not offline and whose last heartbeat is older than `cutoff`. */
  listStaleNodes(clusterId: string, cutoff: Date): Node[] {
    return this.exec
      .select()
      .from(nodes)
      .where(
        and(
          eq(nodes.clusterId, clusterId),
          ne(nodes.role, "leader"),
          ne(nodes.status, "offline"),
          or(lt(nodes.lastHeartbeat, cutoff), and(sql`${nodes.lastHeartbeat} IS NULL`, lt(nodes.joinedAt, cutoff))),
        ),
      )
      .all();
  }

  deleteNode(id: string): boolean {
    const result = this.exec.delete(nodes).where(eq(nodes.id, id)).run();
    return result.changes > 0;
  }

  createCA(data: InsertCertificateAuthority): CertificateAuthority {
    return this.exec
      .insert(certificateAuthorities)
      .values({ ...data, createdAt: new Date() })
      .returning()
      .get();
  }

  createToken(data: InsertBootstrapToken): BootstrapToken {
    return this.exec
      .insert(bootstrapTokens)
      .values({ ...data, createdAt: new Date() })
      .returning()
      .get();
  }

  markTokenUsed(token: string, at: Date = new Date()): void {
    this.exec
      .update(bootstrapTokens)
      .set({ used: true, usedAt: at })
      .where(eq(bootstrapTokens.token, token))
      .run();
  }

  /** Validates and marks the token used in the caller's transaction. */
  consumeToken(token: string, now: Date = new Date()): string {
    const clusterId = this.validateToken(token, now);
    this.markTokenUsed(token, now);
    return clusterId;
  }

  deleteExpiredTokens(now: Date = new Date()): number {
    return this.exec.delete(bootstrapTokens).where(lt(bootstrapTokens.expiresAt, now)).run().changes;
  }

  createNodeCertificate(data: InsertNodeCertificate): NodeCertificate {
    return this.exec.insert(nodeCertificates).values(data).returning().get();
  }

  /** Last write wins. */
  setConfig(key: string, value: string, at: Date = new Date()): void {
    this.exec
      .insert(kvStore)
      .values({ key, value, updatedAt: at })
      .onConflictDoUpdate({ target: kvStore.key, set: { value, updatedAt: at } })
      .run();
  }

  deleteConfig(key: string): boolean {
    return this.exec.delete(kvStore).where(eq(kvStore.key, key)).run().changes > 0;
  }

  recordEvent(data: InsertClusterEvent): void {
    this.exec
      .insert(events)
      .values({ ...data, createdAt: new Date() })
      .run();
  }
}

export interface IClusterStore {
  readonly role: NodeRole;
  readonly reads: ClusterReader;
  /**
   * Runs `fn` in one IMMEDIATE transaction: every write inside it commits
   * together or, if `fn` throws, none does. `fn` must be synchronous.
   */
  withTransaction<T>(fn: (tx: ClusterRepository) => T): T;
}

export class DatabaseClusterStore implements IClusterStore {
  readonly reads: ClusterReader;

  constructor(
    private readonly db: Executor,
    readonly role: NodeRole,
  ) {
    this.reads = new ClusterReader(db);
  }

  withTransaction<T>(fn: (tx: ClusterRepository) => T): T {
    if (this.role !== "leader") {
      throw new NotLeaderError("write cluster state");
    }
    return this.db.transaction((tx) => fn(new ClusterRepository(tx)), { behavior: "immediate" });
  }

  countClusters(): number {
    return this.reads.countClusters();
  }

  validateToken(token: string, now: Date = new Date()): string {
    return this.reads.validateToken(token, now);
  }
}
