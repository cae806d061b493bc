import { isIP } from "net";
import { sql } from "drizzle-orm";
import { sqliteTable, text, integer, index, unique, uniqueIndex, check } from "drizzle-orm/sqlite-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

export const CLUSTER_STATES = ["init", "active", "degraded"] as const;
export const NODE_ROLES = ["leader", "member"] as const;
export const NODE_STATUSES = ["joining", "online", "offline"] as const;

export type ClusterState = (typeof CLUSTER_STATES)[number];
export type NodeRole = (typeof NODE_ROLES)[number];
export type NodeStatus = (typeof NODE_STATUSES)[number];

export const clusters = sqliteTable("clusters", {
  id: text("id").primaryKey(),
  name: text("name").notNull().unique(),
  state: text("state", { enum: CLUSTER_STATES }).notNull().default("init"),
  advertiseAddress: text("advertise_address").notNull(),
  // Constant column under a UNIQUE constraint: the database itself refuses a second cluster row.
  singleton: integer("singleton").notNull().default(1).unique(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
  updatedAt: integer("updated_at", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
}, (table) => [
  check("ck_clusters_name_length", sql`length(${table.name}) >= 3`),
  check("ck_clusters_state", sql`${table.state} IN ('init', 'active', 'degraded')`),
  check("ck_clusters_singleton", sql`${table.singleton} = 1`),
]);

export const nodes = sqliteTable("nodes", {
  id: text("id").primaryKey(),
  clusterId: text("cluster_id").notNull().references(() => clusters.id, { onDelete: "cascade" }),
  hostname: text("hostname").notNull(),
  ip: text("ip").notNull(),
  role: text("role", { enum: NODE_ROLES }).notNull(),
  status: text("status", { enum: NODE_STATUSES }).notNull(),
  joinedAt: integer("joined_at", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
  lastHeartbeat: integer("last_heartbeat", { mode: "timestamp_ms" }),
  updatedAt: integer("updated_at", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
}, (table) => [
  unique("uq_nodes_cluster_hostname").on(table.clusterId, table.hostname),
  unique("uq_nodes_cluster_ip").on(table.clusterId, table.ip),
  // At most one leader per cluster.
  uniqueIndex("uq_nodes_cluster_leader").on(table.clusterId).where(sql`role = 'leader'`),
  index("idx_nodes_status").on(table.status),
  check("ck_nodes_role", sql`${table.role} IN ('leader', 'member')`),
  check("ck_nodes_status", sql`${table.status} IN ('joining', 'online', 'offline')`),
]);

export const certificateAuthorities = sqliteTable("certificate_authorities", {
  id: text("id").primaryKey(),
  clusterId: text("cluster_id").notNull().unique().references(() => clusters.id, { onDelete: "cascade" }),
  certPem: text("cert_pem").notNull(),
  keyPem: text("key_pem").notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
});

export const bootstrapTokens = sqliteTable("bootstrap_tokens", {
  token: text("token").primaryKey(),
  clusterId: text("cluster_id").notNull().references(() => clusters.id, { onDelete: "cascade" }),
  expiresAt: integer("expires_at", { mode: "timestamp_ms" }).notNull(),
  used: integer("used", { mode: "boolean" }).notNull().default(false),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
  usedAt: integer("used_at", { mode: "timestamp_ms" }),
}, (table) => [
  index("idx_tokens_expires_at").on(table.expiresAt),
]);

export const nodeCertificates = sqliteTable("node_certificates", {
  id: text("id").primaryKey(),
  nodeId: text("node_id").notNull().references(() => nodes.id, { onDelete: "cascade" }),
  certPem: text("cert_pem").notNull(),
  serial: text("serial").notNull(),
  issuedAt: integer("issued_at", { mode: "timestamp_ms" }).notNull(),
  expiresAt: integer("expires_at", { mode: "timestamp_ms" }).notNull(),
}, (table) => [
  index("idx_node_certs_node_id").on(table.nodeId),
]);

export const events = sqliteTable("events", {
  id: integer("id").primaryKey({ autoIncrement: true }),
  clusterId: text("cluster_id").references(() => clusters.id, { onDelete: "cascade" }),
  nodeId: text("node_id"),
  type: text("type").notNull(),
  message: text("message").notNull(),
  createdAt: integer("created_at", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
}, (table) => [
  index("idx_events_created_at").on(table.createdAt),
]);

export const kvStore = sqliteTable("kv_store", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
  updatedAt: integer("updated_at", { mode: "timestamp_ms" }).notNull().$defaultFn(() => new Date()),
});

export type Cluster = typeof clusters.$inferSelect;
export type InsertCluster = Omit<typeof clusters.$inferInsert, "singleton" | "createdAt" | "updatedAt">;
export type Node = typeof nodes.$inferSelect;
export type InsertNode = Omit<typeof nodes.$inferInsert, "updatedAt">;
export type CertificateAuthority = typeof certificateAuthorities.$inferSelect;
export type InsertCertificateAuthority = Omit<typeof certificateAuthorities.$inferInsert, "createdAt">;
export type BootstrapToken = typeof bootstrapTokens.$inferSelect;
export type InsertBootstrapToken = Omit<typeof bootstrapTokens.$inferInsert, "createdAt" | "usedAt">;
export type NodeCertificate = typeof nodeCertificates.$inferSelect;
export type InsertNodeCertificate = typeof nodeCertificates.$inferInsert;
export type ClusterEvent = typeof events.$inferSelect;
export type InsertClusterEvent = Omit<typeof events.$inferInsert, "id" | "createdAt">;
export type KVEntry = typeof kvStore.$inferSelect;

// Health collaborators move an existing cluster between active and degraded.
export const updateClusterStateSchema = createInsertSchema(clusters)
  .pick({ state: true })
  .required()
  .refine((value) => value.state !== "init", { message: "state must be active or degraded" });

// --- Addresses ---

export type HostPort = {
  host: string;
  port: number;
};

/**
 * Splits "10.0.0.5:8443" or "[fd00::5]:8443" into host and port.
 * Returns undefined when the value is not an IP literal with a valid port.
 */
export function parseAdvertiseAddress(value: string): HostPort | undefined {
  const match = /^(?:\[([0-9A-Fa-f:.]+)\]|([0-9.]+)):(\d{1,5})$/.exec(value.trim());
  if (!match) return undefined;
  const host = match[1] ?? match[2];
  const port = Number(match[3]);
  if (!host || isIP(host) === 0) return undefined;
  if (!Number.isInteger(port) || port < 1 || port > 65535) return undefined;
  return { host, port };
}

// --- Control API request schemas ---

export const clusterNameSchema = z
  .string()
  .trim()
  .min(3, "cluster name must be at least 3 characters")
  .max(63, "cluster name must be at most 63 characters")
  .regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, "cluster name may only contain letters, digits, '.', '_' and '-', and must start with a letter or digit");

export const initClusterRequestSchema = z.object({
  name: clusterNameSchema,
  advertise_address: z
    .string()
    .refine((value) => parseAdvertiseAddress(value) !== undefined, {
      message: "advertise_address must be an IP address with a port, e.g. 10.0.0.5:8443",
    }),
});

export const nodeInfoSchema = z.object({
  hostname: z
    .string()
    .trim()
    .min(1, "hostname is required")
    .max(253)
    .regex(/^[A-Za-z0-9]([A-Za-z0-9.-]*[A-Za-z0-9])?$/, "hostname is not a valid host name"),
  ip: z.string().trim().refine((value) => isIP(value) !== 0, { message: "ip must be an IPv4 or IPv6 address" }),
});

export const joinClusterRequestSchema = z.object({
  token: z.string().min(1, "token is required"),
  node_info: nodeInfoSchema,
});

export type InitClusterRequest = z.infer<typeof initClusterRequestSchema>;
export type NodeInfo = z.infer<typeof nodeInfoSchema>;
export type JoinClusterRequest = z.infer<typeof joinClusterRequestSchema>;
