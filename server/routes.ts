import type { Express, Request, Response, NextFunction } from "express";
import {
  initClusterRequestSchema,
  joinClusterRequestSchema,
  updateClusterStateSchema,
  type Node,
  type NodeRole,
} from "@shared/schema";
import {
  ControlPlaneError,
  LeaderCertificateRequiredError,
  NodeAccessDeniedError,
  NodeNotFoundError,
  NotInitializedError,
  toErrorBody,
  validationErrorFrom,
} from "./errors";
import type { AdapterType } from "./config";
import type { IClusterStore } from "./storage";
import type { BootstrapOrchestrator } from "./services/bootstrapOrchestrator";
import type { NodeLifecycleService } from "./services/nodeLifecycleService";
import type { OperationContext, OperationKind, OperationTracker } from "./services/operationTracker";
import { requireClientCertificate } from "./middleware/clientCertificate";

export type ControlPlaneServices = {
  role: NodeRole;
  adapterType: AdapterType;
  store: IClusterStore;
  orchestrator: BootstrapOrchestrator;
  lifecycle: NodeLifecycleService;
  operations: OperationTracker;
};

function nodeSummary(node: Node) {
  return { id: node.id, hostname: node.hostname, ip: node.ip, role: node.role, status: node.status };
}

function wantsAsync(req: Request): boolean {
  return /\brespond-async\b/i.test(req.get("prefer") ?? "");
}

function handleError(err: unknown, res: Response, next: NextFunction) {
  if (err instanceof ControlPlaneError) {
    return res.status(err.statusCode).json(toErrorBody(err));
  }
  next(err);
}

/**
 * Runs a tracked operation. With `Prefer: respond-async` the caller gets the
 * operation id at once and polls; otherwise the response waits for the result.
 */
async function respondWithOperation<T>(
  req: Request,
  res: Response,
  next: NextFunction,
  operations: OperationTracker,
  kind: OperationKind,
  work: (ctx: OperationContext) => Promise<T>,
) {
  if (wantsAsync(req)) {
    const id = operations.dispatch(kind, work);
    res.setHeader("Location", `/operations/${id}`);
    return res.status(202).json({ operation_id: id });
  }
  try {
    const result = await operations.run(kind, work);
    res.json(result);
  } catch (err) {
    handleError(err, res, next);
  }
}

export function registerControlRoutes(app: Express, services: ControlPlaneServices): void {
  const { orchestrator, lifecycle, operations } = services;

  app.get("/health", (_req, res) => {
    res.json({ status: "ok", role: services.role, adapter: services.adapterType });
  });

  app.post("/cluster/init", async (req, res, next) => {
    const parsed = initClusterRequestSchema.safeParse(req.body);
    if (!parsed.success) return handleError(validationErrorFrom(parsed.error), res, next);

    await respondWithOperation(req, res, next, operations, "bootstrap", async (ctx) => {
      const result = await orchestrator.bootstrap(parsed.data, { onPhase: ctx.reportPhase });
      return {
        cluster_id: result.clusterId,
        token: result.token,
        leader: nodeSummary(result.leader),
      };
    });
  });

  app.post("/cluster/join", async (req, res, next) => {
    const parsed = joinClusterRequestSchema.safeParse(req.body);
    if (!parsed.success) return handleError(validationErrorFrom(parsed.error), res, next);

    await respondWithOperation(req, res, next, operations, "join", async (ctx) => {
      const result = await lifecycle.join(parsed.data, { onPhase: ctx.reportPhase });
      return {
        node_id: result.nodeId,
        status: result.status,
        certificate: result.certificate,
        private_key: result.privateKey,
        ca_certificate: result.caCertificate,
      };
    });
  });

  app.get("/operations/:id", (req, res) => {
    const operation = operations.get(req.params.id);
    if (!operation) return res.status(404).json({ message: "Operation not found" });
    res.json(operation);
  });
}

/**
 * Member API. Mounted on the mutually authenticated server only; a member
 * may act on its own node record, the leader on any. Cluster administration
 * (join tokens, cluster state) takes the leader's certificate.
 */
export function registerMemberRoutes(app: Express, services: ControlPlaneServices): void {
  const { store, lifecycle, operations } = services;

  app.use(["/nodes", "/cluster"], requireClientCertificate);

  function requireLeaderCaller(req: Request): void {
    const cluster = store.reads.getCluster();
    if (!cluster) throw new NotInitializedError();
    const caller = req.memberIdentity.commonName;
    const leader = store.reads.listNodes(cluster.id).find((n) => n.role === "leader");
    if (caller !== leader?.hostname) {
      throw new LeaderCertificateRequiredError(caller);
    }
  }

  function authorizeNode(req: Request): Node {
    const node = store.reads.getNode(req.params.id);
    if (!node) throw new NodeNotFoundError(req.params.id);
    const caller = req.memberIdentity.commonName;
    const leader = store.reads.listNodes(node.clusterId).find((n) => n.role === "leader");
    if (caller !== node.hostname && caller !== leader?.hostname) {
      throw new NodeAccessDeniedError(caller, node.hostname);
    }
    return node;
  }

  function tryAuthorizeNode(req: Request, res: Response, next: NextFunction): Node | undefined {
    try {
      return authorizeNode(req);
    } catch (err) {
      handleError(err, res, next);
      return undefined;
    }
  }

  app.post("/nodes/:id/online", async (req, res, next) => {
    try {
      const node = authorizeNode(req);
      res.json(nodeSummary(await lifecycle.markOnline(node.id)));
    } catch (err) {
      handleError(err, res, next);
    }
  });

  app.post("/nodes/:id/heartbeat", async (req, res, next) => {
    try {
      const node = authorizeNode(req);
      res.json(nodeSummary(await lifecycle.recordHeartbeat(node.id)));
    } catch (err) {
      handleError(err, res, next);
    }
  });

  app.post("/nodes/:id/leave", async (req, res, next) => {
    const node = tryAuthorizeNode(req, res, next);
    if (!node) return;
    await respondWithOperation(req, res, next, operations, "leave", async (ctx) => {
      const result = await lifecycle.leave(node.id, { onPhase: ctx.reportPhase });
      return { node_id: result.nodeId, status: "removed" };
    });
  });

  app.post("/cluster/tokens", async (req, res, next) => {
    try {
      requireLeaderCaller(req);
      const issued = await lifecycle.issueJoinToken();
      res.status(201).json({ token: issued.token, expires_at: issued.expiresAt.toISOString() });
    } catch (err) {
      handleError(err, res, next);
    }
  });

  app.get("/cluster", (_req, res, next) => {
    try {
      const cluster = store.reads.getCluster();
      if (!cluster) throw new NotInitializedError();
      res.json({ cluster, nodes: store.reads.listNodes(cluster.id) });
    } catch (err) {
      handleError(err, res, next);
    }
  });

  app.patch("/cluster", (req, res, next) => {
    try {
      requireLeaderCaller(req);
      const parsed = updateClusterStateSchema.safeParse(req.body);
      if (!parsed.success) throw validationErrorFrom(parsed.error);
      const { state } = parsed.data;
      const updated = store.withTransaction((tx) => {
        const cluster = tx.getCluster();
        if (!cluster) throw new NotInitializedError();
        const changed = tx.updateClusterState(cluster.id, state) ?? cluster;
        if (cluster.state !== changed.state) {
          tx.recordEvent({
            clusterId: cluster.id,
            nodeId: null,
            type: "cluster.state_changed",
            message: `Cluster state ${cluster.state} → ${changed.state}`,
          });
        }
        return changed;
      });
      res.json(updated);
    } catch (err) {
      handleError(err, res, next);
    }
  });
}
