/**
 * Agent configuration.
 *
 * Priority (highest wins): constructor arg > env var > default.
 */

import { hostname as osHostname, homedir } from "node:os";
import { join } from "node:path";

import { ConfigurationError } from "../protocol/index.js";
import { LogLevel, parseLogLevel } from "./logger.js";

const DEFAULT_HOME_DIR = ".didwire";

export interface AgentConfigOptions {
  name?: string | null;
  passphrase?: string | null;
  hostname?: string | null;
  port?: number | null;
  dataDir?: string | null;
  ephemeral?: boolean | null;
  adminKey?: string | null;
  logLevel?: string | null;
  maxSignatureAgeSeconds?: number | null;
}

function envFlag(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return ["1", "true", "yes"].includes(value.trim().toLowerCase());
}

function envInt(name: string): number | undefined {
  const value = process.env[name];
  if (value === undefined || value === "") return undefined;
  const n = Number(value);
  if (!Number.isInteger(n)) {
    throw new ConfigurationError(`Invalid ${name} '${value}'`);
  }
  return n;
}

/** Wallet file for an agent name under a data directory. */
export function walletPathFor(dataDir: string, name: string, ephemeral: boolean): string {
  const suffix = ephemeral ? "ephemeral_wallet" : "wallet";
  return join(dataDir, "wallets", `${name}-${suffix}.db`);
}

export class AgentConfig {
  readonly name: string;
  readonly passphrase: string | null;
  readonly hostname: string;
  readonly port: number | null;
  readonly dataDir: string;
  readonly ephemeral: boolean;
  readonly adminKey: string | null;
  readonly logLevel: LogLevel;
  /** Freshness window for signed connection fields; null accepts any age. */
  readonly maxSignatureAgeSeconds: number | null;
  /** Where peers deliver agent-wire messages. */
  readonly endpoint: string;

  constructor(options: AgentConfigOptions = {}) {
    const env = process.env;

    const name = options.name ?? env["DIDWIRE_NAME"];
    if (!name) {
      throw new ConfigurationError("Agent name is required (--name or DIDWIRE_NAME)");
    }
    this.name = name;

    this.passphrase = options.passphrase ?? env["DIDWIRE_PASSPHRASE"] ?? null;
    this.hostname = options.hostname ?? env["DIDWIRE_HOST"] ?? osHostname();

    const port = options.port ?? envInt("DIDWIRE_PORT") ?? null;
    if (port !== null && (!Number.isInteger(port) || port < 1 || port > 65535)) {
      throw new ConfigurationError(`Invalid port ${port}. Must be 1-65535.`);
    }
    this.port = port;

    // DIDWIRE_HOME overrides ~/.didwire (useful for testing / isolation).
    this.dataDir = options.dataDir ?? env["DIDWIRE_HOME"] ?? join(homedir(), DEFAULT_HOME_DIR);

    this.ephemeral = options.ephemeral ?? envFlag(env["DIDWIRE_EPHEMERAL"]) ?? false;
    this.adminKey = options.adminKey ?? env["DIDWIRE_ADMIN_KEY"] ?? null;

    const levelName = options.logLevel ?? env["DIDWIRE_LOG_LEVEL"] ?? "info";
    const level = parseLogLevel(levelName);
    if (level === null) {
      throw new ConfigurationError(
        `Invalid log level '${levelName}'. Must be one of: debug, info, warn, error, none`
      );
    }
    this.logLevel = level;

    const maxAge = options.maxSignatureAgeSeconds ?? envInt("DIDWIRE_MAX_SIGNATURE_AGE") ?? null;
    if (maxAge !== null && maxAge <= 0) {
      throw new ConfigurationError(`Invalid signature age ${maxAge}. Must be positive.`);
    }
    this.maxSignatureAgeSeconds = maxAge;

    const base = `http://${this.hostname}` + (this.port !== null ? `:${this.port}` : "");
    this.endpoint = `${base}/indy`;
  }

  /** SQLite file holding this agent's wallet. */
  get walletPath(): string {
    return walletPathFor(this.dataDir, this.name, this.ephemeral);
  }
}
