import os from "os";
import { z } from "zod";
import { NODE_ROLES, type NodeRole } from "@shared/schema";

export const ADAPTER_TYPES = ["real", "noop"] as const;
export type AdapterType = (typeof ADAPTER_TYPES)[number];

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(9028),
  HOST: z.string().min(1).default("0.0.0.0"),
  MEMBER_API_PORT: z.coerce.number().int().min(1).max(65535).default(9443),
  NODE_ROLE: z.enum(NODE_ROLES).default("leader"),
  NODE_HOSTNAME: z.string().min(1).optional(),
  DB_PATH: z.string().min(1).default("./data/mcloud.db"),
  STATE_PATH: z.string().min(1).default("./data/state.yaml"),
  ADAPTER: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(ADAPTER_TYPES))
    .default("real"),
  STORAGE_DEVICE: z.string().min(1).default("/dev/sdb"),
  EXTERNAL_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  TOKEN_TTL_HOURS: z.coerce.number().positive().default(24),
  HEARTBEAT_TIMEOUT_MS: z.coerce.number().int().positive().default(90_000),
});

export type ControlPlaneConfig = {
  port: number;
  host: string;
  memberApiPort: number;
  role: NodeRole;
  hostname: string;
  dbPath: string;
  statePath: string;
  adapter: AdapterType;
  storageDevice: string;
  externalTimeoutMs: number;
  tokenTtlMs: number;
  heartbeatTimeoutMs: number;
};

export class ConfigError extends Error {
  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

// Empty strings count as unset so a blank line in .env falls back to the default.
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") out[key] = value;
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ControlPlaneConfig {
  const parsed = envSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`));
  }
  const vars = parsed.data;
  return {
    port: vars.PORT,
    host: vars.HOST,
    memberApiPort: vars.MEMBER_API_PORT,
    role: vars.NODE_ROLE,
    hostname: vars.NODE_HOSTNAME ?? os.hostname(),
    dbPath: vars.DB_PATH,
    statePath: vars.STATE_PATH,
    adapter: vars.ADAPTER,
    storageDevice: vars.STORAGE_DEVICE,
    externalTimeoutMs: vars.EXTERNAL_TIMEOUT_MS,
    tokenTtlMs: vars.TOKEN_TTL_HOURS * 60 * 60 * 1000,
    heartbeatTimeoutMs: vars.HEARTBEAT_TIMEOUT_MS,
  };
}
