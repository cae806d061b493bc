import { randomUUID } from "crypto";
import {
  initClusterRequestSchema,
  parseAdvertiseAddress,
  type Cluster,
  type InitClusterRequest,
  type Node,
  type NodeRole,
} from "@shared/schema";
import {
  AlreadyInitializedError,
  NodeStateConflictError,
  NotLeaderError,
  PersistenceFailedAfterExternalBootstrapError,
  ValidationError,
  validationErrorFrom,
} from "../errors";
import type { IClusterStore } from "../storage";
import type { ExternalAdapters, ExternalOperationAdapter, Subsystem, SubsystemConfig } from "../execution/types";
import type { HostProbe } from "../execution/hostProbe";
import { requiredTools } from "../execution/adapterFactory";
import { runExternalOperation } from "../execution/boundary";
import { BOOTSTRAP_PHASES, PhasePipeline, type BootstrapPhase } from "../orchestration/pipeline";
import { buildSubsystemConfig } from "../orchestration/subsystemConfig";
import type { NodeStateFile } from "../nodeState";
import {
  describeToken,
  type CredentialAuthority,
  type IssuedCertificate,
  type PemPair,
} from "./credentialAuthority";

export type BootstrapOrchestratorDeps = {
  role: NodeRole;
  store: IClusterStore;
  authority: CredentialAuthority;
  adapters: ExternalAdapters;
  hostProbe: HostProbe;
  nodeState: NodeStateFile;
  hostname: string;
  storageDevice: string;
  externalTimeoutMs: number;
  tokenTtlMs: number;
  /** Called after the cluster records are committed. */
  onClusterReady?: (cluster: Cluster) => void | Promise<void>;
  now?: () => Date;
};

export type BootstrapOptions = {
  onPhase?: (phase: BootstrapPhase) => void;
};

type PersistInput = {
  clusterId: string;
  leaderId: string;
  name: string;
  advertiseAddress: string;
  host: string;
  ca: PemPair;
  token: string;
  leaderCert: IssuedCertificate;
  bootstrapped: readonly Subsystem[];
  now: Date;
};

export type BootstrapResult = {
  clusterId: string;
  clusterName: string;
  token: string;
  leader: Node;
  phases: BootstrapPhase[];
};

// Compute first: network and storage register against it.
const BOOTSTRAP_STEPS: ReadonlyArray<{ subsystem: Subsystem; phase: BootstrapPhase }> = [
  { subsystem: "compute", phase: "ComputeBootstrapped" },
  { subsystem: "network", phase: "NetworkBootstrapped" },
  { subsystem: "storage", phase: "StorageBootstrapped" },
];

export function bootstrapConfigEntries(name: string, advertiseAddress: string, storageDevice: string): [string, string][] {
  return [
    ["compute.cluster.name", name],
    ["compute.cluster.address", advertiseAddress],
    ["storage.enabled", "true"],
    ["storage.cluster.name", `${name}-ceph`],
    ["storage.device", storageDevice],
    ["network.enabled", "true"],
    ["network.name", `${name}-ovn`],
  ];
}

/**
 * Turns an empty store into a cluster with one online leader. Nothing is
 * written to the store until every subsystem has bootstrapped, and then
 * everything is written in one transaction.
 */
export class BootstrapOrchestrator {
  private queue: Promise<unknown> = Promise.resolve();
  private readonly now: () => Date;

  constructor(private readonly deps: BootstrapOrchestratorDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  /** Runs are serialized: a second call waits for the first and then runs its own preflight. */
  bootstrap(request: InitClusterRequest, opts: BootstrapOptions = {}): Promise<BootstrapResult> {
    const run = this.queue.then(() => this.runBootstrap(request, opts));
    // The queue only orders runs; each caller gets its own outcome from `run`.
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async runBootstrap(request: InitClusterRequest, opts: BootstrapOptions): Promise<BootstrapResult> {
    const { deps } = this;
    const pipeline = new PhasePipeline<BootstrapPhase>("bootstrap", BOOTSTRAP_PHASES, (phase, previous) => {
      console.log(`[bootstrap] ${previous} → ${phase}`);
      opts.onPhase?.(phase);
    });
    opts.onPhase?.(pipeline.current);

    // Preflight
    const { name, advertiseAddress, host, port } = await this.preflight(request);

    // CredentialsGenerated
    const clusterId = randomUUID();
    const leaderId = randomUUID();
    const ca = await deps.authority.createCA();
    const token = deps.authority.generateBootstrapToken(clusterId);
    const leaderCert = await deps.authority.issueNodeCertificate(ca, host, deps.hostname);
    pipeline.advance("CredentialsGenerated");

    const subsystemConfig = buildSubsystemConfig(
      { id: clusterId, name, advertiseAddress },
      { hostname: deps.hostname, ip: host },
      ca.certPem,
      deps.storageDevice,
    );

    const bootstrapped: Subsystem[] = [];
    for (const step of BOOTSTRAP_STEPS) {
      await this.bootstrapSubsystem(deps.adapters[step.subsystem], subsystemConfig);
      bootstrapped.push(step.subsystem);
      pipeline.advance(step.phase);
    }

    // Persisted
    const now = this.now();
    const { cluster, leader } = this.persist({
      clusterId,
      leaderId,
      name,
      advertiseAddress,
      host,
      ca,
      token,
      leaderCert,
      bootstrapped,
      now,
    });
    pipeline.advance("Persisted");

    // Finalized
    try {
      await deps.nodeState.initialize(
        {
          node: { id: leader.id, hostname: leader.hostname, ip: leader.ip, role: "leader", status: "online" },
          cluster: { id: clusterId, name, advertise_address: advertiseAddress },
        },
        now,
      );
      await deps.nodeState.writeCredentials({
        certificate: leaderCert.certPem,
        privateKey: leaderCert.keyPem,
        caCertificate: ca.certPem,
      });
    } catch (err) {
      console.error(
        `[bootstrap] Cluster ${clusterId} is committed but the node state or credentials could not be written: ${
          err instanceof Error ? err.message : String(err)
        }`,
      );
    }
    if (deps.onClusterReady) {
      try {
        await deps.onClusterReady(cluster);
      } catch (err) {
        console.error(`[bootstrap] Post-bootstrap hook failed: ${err instanceof Error ? err.message : String(err)}`);
      }
    }
    pipeline.advance("Finalized");
    console.log(`[bootstrap] Cluster "${name}" (${clusterId}) ready on port ${port}; join token ${describeToken(token)}`);

    return {
      clusterId,
      clusterName: name,
      token,
      leader,
      phases: pipeline.history.map((record) => record.phase),
    };
  }

  private persist(run: PersistInput): { cluster: Cluster; leader: Node } {
    const { deps } = this;
    const { clusterId, leaderId, name, advertiseAddress, now } = run;
    try {
      return deps.store.withTransaction((tx) => {
        if (tx.countClusters() > 0) {
          throw new AlreadyInitializedError("a cluster was committed while this run was bootstrapping");
        }
        const cluster = tx.createCluster({ id: clusterId, name, state: "active", advertiseAddress });
        const leader = tx.createNode({
          id: leaderId,
          clusterId,
          hostname: deps.hostname,
          ip: run.host,
          role: "leader",
          status: "online",
          joinedAt: now,
          lastHeartbeat: now,
        });
        tx.createCA({ id: randomUUID(), clusterId, certPem: run.ca.certPem, keyPem: run.ca.keyPem });
        tx.createToken({ token: run.token, clusterId, expiresAt: new Date(now.getTime() + deps.tokenTtlMs), used: false });
        tx.createNodeCertificate({
          id: randomUUID(),
          nodeId: leaderId,
          certPem: run.leaderCert.certPem,
          serial: run.leaderCert.serial,
          issuedAt: run.leaderCert.notBefore,
          expiresAt: run.leaderCert.notAfter,
        });
        for (const [key, value] of bootstrapConfigEntries(name, advertiseAddress, deps.storageDevice)) {
          tx.setConfig(key, value, now);
        }
        tx.recordEvent({
          clusterId,
          nodeId: leaderId,
          type: "cluster.bootstrapped",
          message: `Cluster "${name}" bootstrapped with leader ${deps.hostname} (${advertiseAddress})`,
        });
        return { cluster, leader };
      });
    } catch (err) {
      const failure = new PersistenceFailedAfterExternalBootstrapError(run.bootstrapped, err);
      console.error(`[bootstrap] MANUAL INSPECTION REQUIRED: ${failure.message}`);
      throw failure;
    }
  }

  private async preflight(
    request: InitClusterRequest,
  ): Promise<{ name: string; advertiseAddress: string; host: string; port: number }> {
    const { deps } = this;
    if (deps.role !== "leader") {
      throw new NotLeaderError("bootstrap cluster");
    }

    const parsed = initClusterRequestSchema.safeParse(request);
    if (!parsed.success) {
      throw validationErrorFrom(parsed.error);
    }
    const name = parsed.data.name;
    const advertiseAddress = parsed.data.advertise_address.trim();
    const advertise = parseAdvertiseAddress(advertiseAddress);
    if (!advertise) {
      throw new ValidationError([`advertise_address: "${advertiseAddress}" is not an IP address with a port`]);
    }

    if (deps.store.reads.countClusters() > 0) {
      throw new AlreadyInitializedError();
    }
    if (deps.store.reads.getClusterByName(name)) {
      throw new AlreadyInitializedError(`cluster name "${name}" is taken`);
    }
    if (await deps.nodeState.isInitialized()) {
      throw new NodeStateConflictError(deps.nodeState.filePath);
    }

    const issues: string[] = [];
    for (const tool of requiredTools(deps.adapters)) {
      if (!(await deps.hostProbe.commandExists(tool))) {
        issues.push(`required tool "${tool}" is not on PATH`);
      }
    }
    if (!(await deps.hostProbe.portAvailable(advertise.port))) {
      issues.push(`port ${advertise.port} is already in use`);
    }
    if (!(await deps.hostProbe.pathExists(deps.storageDevice))) {
      issues.push(`storage device ${deps.storageDevice} does not exist`);
    }
    if (issues.length > 0) {
      throw new ValidationError(issues);
    }

    return { name, advertiseAddress, host: advertise.host, port: advertise.port };
  }

  private bootstrapSubsystem(adapter: ExternalOperationAdapter, config: SubsystemConfig): Promise<void> {
    return runExternalOperation(
      adapter,
      "bootstrap",
      this.deps.externalTimeoutMs,
      `cluster=${config.clusterName} node=${config.nodeHostname} address=${config.advertiseHost}:${config.advertisePort}`,
      (signal) => adapter.bootstrap(config, { signal }),
    );
  }
}
