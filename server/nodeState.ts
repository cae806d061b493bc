import fs from "fs/promises";
import path from "path";
import { parse, stringify } from "yaml";
import { z } from "zod";
import { NODE_ROLES, NODE_STATUSES } from "@shared/schema";
import { NodeStateConflictError } from "./errors";

export const NODE_STATE_VERSION = "1.0.0";

const nodeStateSchema = z.object({
  version: z.string(),
  node: z.object({
    id: z.string(),
    hostname: z.string(),
    ip: z.string(),
    role: z.enum(NODE_ROLES),
    status: z.enum(NODE_STATUSES),
    initialized_at: z.string(),
  }),
  cluster: z.object({
    id: z.string(),
    name: z.string(),
    advertise_address: z.string(),
  }),
  flags: z.object({
    initialized: z.boolean(),
  }),
});

export type NodeStateDocument = z.infer<typeof nodeStateSchema>;

export type InitializeNodeState = {
  node: Omit<NodeStateDocument["node"], "initialized_at">;
  cluster: NodeStateDocument["cluster"];
};

export type NodeCredentials = {
  certificate: string;
  privateKey: string;
  caCertificate: string;
};

function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}

/**
 * The per-node record of identity and cluster membership. Once written with
 * `flags.initialized` it is never overwritten; only {@link NodeStateFile.reset}
 * clears it.
 */
export class NodeStateFile {
  constructor(readonly filePath: string) {}

  async load(): Promise<NodeStateDocument | undefined> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf-8");
    } catch (err) {
      if (isMissing(err)) return undefined;
      throw err;
    }
    const parsed = nodeStateSchema.safeParse(parse(raw));
    if (!parsed.success) {
      throw new Error(
        `Node state at ${this.filePath} is malformed: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}`,
      );
    }
    return parsed.data;
  }

  async isInitialized(): Promise<boolean> {
    const current = await this.load();
    return current?.flags.initialized === true;
  }

  async initialize(input: InitializeNodeState, at: Date = new Date()): Promise<NodeStateDocument> {
    if (await this.isInitialized()) {
      throw new NodeStateConflictError(this.filePath);
    }
    const doc: NodeStateDocument = {
      version: NODE_STATE_VERSION,
      node: { ...input.node, initialized_at: at.toISOString() },
      cluster: { ...input.cluster },
      flags: { initialized: true },
    };
    await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
    const tmp = `${this.filePath}.tmp`;
    await fs.writeFile(tmp, stringify(doc), { encoding: "utf-8", mode: 0o600 });
    await fs.rename(tmp, this.filePath);
    return doc;
  }

  /** Where this node's certificate, key and the cluster CA live: beside the state file. */
  get credentialPaths(): { certificate: string; privateKey: string; caCertificate: string } {
    const dir = path.dirname(path.resolve(this.filePath));
    return {
      certificate: path.join(dir, "node.crt"),
      privateKey: path.join(dir, "node.key"),
      caCertificate: path.join(dir, "ca.crt"),
    };
  }

  async writeCredentials(creds: NodeCredentials): Promise<void> {
    const paths = this.credentialPaths;
    await fs.mkdir(path.dirname(paths.privateKey), { recursive: true });
    await fs.writeFile(paths.privateKey, creds.privateKey, { encoding: "utf-8", mode: 0o600 });
    await fs.writeFile(paths.certificate, creds.certificate, { encoding: "utf-8", mode: 0o644 });
    await fs.writeFile(paths.caCertificate, creds.caCertificate, { encoding: "utf-8", mode: 0o644 });
  }

  /** Administrative reset. Returns false when there was nothing to remove. */
  async reset(): Promise<boolean> {
    for (const file of Object.values(this.credentialPaths)) {
      await fs.rm(file, { force: true });
    }
    try {
      await fs.unlink(this.filePath);
      return true;
    } catch (err) {
      if (isMissing(err)) return false;
      throw err;
    }
  }
}
