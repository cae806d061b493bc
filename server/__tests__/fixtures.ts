import fs from "fs";
import os from "os";
import path from "path";
import type { NodeRole } from "@shared/schema";
import { openDatabase, type OpenedDatabase } from "../db";
import { DatabaseClusterStore } from "../storage";
import type { HostProbe } from "../execution/hostProbe";
import { CredentialAuthority } from "../services/credentialAuthority";

export function createTestStore(role: NodeRole = "leader"): { database: OpenedDatabase; store: DatabaseClusterStore } {
  const database = openDatabase(":memory:");
  return { database, store: new DatabaseClusterStore(database.db, role) };
}

export function createTestAuthority(): CredentialAuthority {
  return new CredentialAuthority({ caKeyBits: 2048, leafKeyBits: 2048 });
}

export function createTempDir(prefix = "mcloud-test-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export class FakeHostProbe implements HostProbe {
  readonly missingCommands = new Set<string>();
  readonly missingPaths = new Set<string>();
  readonly busyPorts = new Set<number>();

  async commandExists(command: string): Promise<boolean> {
    return !this.missingCommands.has(command);
  }

  async portAvailable(port: number): Promise<boolean> {
    return !this.busyPorts.has(port);
  }

  async pathExists(target: string): Promise<boolean> {
    return !this.missingPaths.has(target);
  }
}
