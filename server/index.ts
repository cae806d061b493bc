// IMPORTANT:
// Environment variables must be loaded here (process entrypoint).
// Do NOT move dotenv loading into config.ts, db.ts or services.
import dotenv from "dotenv";
dotenv.config();

import { createServer, type Server } from "http";
import type { Server as HttpsServer } from "https";
import type { Cluster } from "@shared/schema";
import { loadConfig } from "./config";
import { openDatabase } from "./db";
import { DatabaseClusterStore } from "./storage";
import { LocalHostProbe, createAdapters } from "./execution";
import { NodeStateFile } from "./nodeState";
import { CredentialAuthority } from "./services/credentialAuthority";
import { BootstrapOrchestrator } from "./services/bootstrapOrchestrator";
import { NodeLifecycleService } from "./services/nodeLifecycleService";
import { OperationTracker } from "./services/operationTracker";
import { createControlApp, createMemberApp, log } from "./app";
import { startMemberServer } from "./tls";
import type { ControlPlaneServices } from "./routes";

const config = loadConfig();
// Only the leader holds the store file; the lock keeps every other process out.
const database = openDatabase(config.dbPath, { exclusive: config.role === "leader" });
const store = new DatabaseClusterStore(database.db, config.role);
const authority = new CredentialAuthority();
const adapters = createAdapters(config.adapter);

let memberServer: HttpsServer | undefined;
let memberApp: ReturnType<typeof createMemberApp> | undefined;

async function ensureMemberServer(cluster: Cluster): Promise<void> {
  if (memberServer || !memberApp) return;
  memberServer = await startMemberServer(memberApp, cluster, {
    store,
    authority,
    hostname: config.hostname,
    host: config.host,
    port: config.memberApiPort,
  });
  log(`member API (mTLS) serving on port ${config.memberApiPort}`, "member-api");
}

const orchestrator = new BootstrapOrchestrator({
  role: config.role,
  store,
  authority,
  adapters,
  hostProbe: new LocalHostProbe(),
  nodeState: new NodeStateFile(config.statePath),
  hostname: config.hostname,
  storageDevice: config.storageDevice,
  externalTimeoutMs: config.externalTimeoutMs,
  tokenTtlMs: config.tokenTtlMs,
  onClusterReady: ensureMemberServer,
});

const lifecycle = new NodeLifecycleService({
  role: config.role,
  store,
  authority,
  adapters,
  storageDevice: config.storageDevice,
  externalTimeoutMs: config.externalTimeoutMs,
  tokenTtlMs: config.tokenTtlMs,
  heartbeatTimeoutMs: config.heartbeatTimeoutMs,
});

const services: ControlPlaneServices = {
  role: config.role,
  adapterType: config.adapter,
  store,
  orchestrator,
  lifecycle,
  operations: new OperationTracker(),
};

memberApp = createMemberApp(services);
const httpServer: Server = createServer(createControlApp(services));

function startMaintenance(): NodeJS.Timeout {
  const intervalMs = Math.max(1000, Math.floor(config.heartbeatTimeoutMs / 3));
  return setInterval(() => {
    if (config.role !== "leader" || !store.reads.getCluster()) return;
    lifecycle.markStaleNodesOffline().catch((err: unknown) => {
      console.error("[lifecycle] Stale-node sweep failed:", err);
    });
    try {
      const removed = store.withTransaction((tx) => tx.deleteExpiredTokens(new Date()));
      if (removed > 0) log(`Removed ${removed} expired bootstrap token(s)`, "store");
    } catch (err) {
      console.error("[store] Token cleanup failed:", err);
    }
  }, intervalMs);
}

(async () => {
  httpServer.listen({ port: config.port, host: config.host }, () => {
    log(`control API serving on port ${config.port} (role=${config.role}, adapter=${config.adapter})`);
  });

  const existing = store.reads.getCluster();
  if (existing && config.role === "leader") {
    await ensureMemberServer(existing);
  }

  const maintenance = startMaintenance();

  const shutdown = (signal: string) => {
    log(`${signal} received, shutting down`);
    clearInterval(maintenance);
    memberServer?.close();
    httpServer.close(() => {
      database.close();
      process.exit(0);
    });
  };
  process.once("SIGTERM", () => shutdown("SIGTERM"));
  process.once("SIGINT", () => shutdown("SIGINT"));
})().catch((err: unknown) => {
  console.error("Fatal start-up error:", err);
  process.exit(1);
});
