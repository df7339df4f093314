/**
 * SQLite-backed wallet: signing keys, DIDs, pairwise relationships, and
 * free-form records (invitations, received messages).
 *
 * Secret seeds are stored encrypted under a key derived from the wallet
 * passphrase; a check value detects a wrong passphrase on open.
 *
 * Uses better-sqlite3 for synchronous SQLite. Call `await sodiumReady`
 * before creating or opening a wallet.
 */

import { existsSync, mkdirSync, rmSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";

import {
  AgentError,
  WalletUnavailableError,
  err,
  errorMessage,
  isJsonObject,
  keypairFromSeed,
  ok,
  utf8Decode,
  utf8Encode,
  type IdentityStore,
  type JsonObject,
  type Keypair,
  type PairwiseInfo,
  type Result,
} from "../protocol/index.js";
import { deriveStorageKey, openSecret, randomBytes, sealSecret } from "../protocol/crypto.js";

export const MEMORY_WALLET = ":memory:";

const CHECK_VALUE = "didwire-wallet-v1";
const SCHEMA_VERSION = 1;

export type WalletCreateOutcome = "created" | "already-exists";
export type WalletDeleteOutcome = "deleted" | "not-found";

export interface WalletRecord {
  type: string;
  id: string;
  value: JsonObject;
}

function initSchema(db: Database.Database, passphrase: string): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS meta (
      key    TEXT PRIMARY KEY,
      value  BLOB NOT NULL
    );

    CREATE TABLE IF NOT EXISTS keys (
      verkey      TEXT PRIMARY KEY,
      secret      BLOB NOT NULL,
      created_at  TEXT NOT NULL DEFAULT (datetime('now'))
    );

    CREATE TABLE IF NOT EXISTS dids (
      did       TEXT PRIMARY KEY,
      verkey    TEXT NOT NULL,
      mine      INTEGER NOT NULL DEFAULT 0,
      metadata  TEXT
    );

    CREATE TABLE IF NOT EXISTS pairwise (
      their_did  TEXT PRIMARY KEY,
      my_did     TEXT NOT NULL,
      metadata   TEXT NOT NULL
    );

    CREATE TABLE IF NOT EXISTS records (
      type   TEXT NOT NULL,
      id     TEXT NOT NULL,
      value  TEXT NOT NULL,
      PRIMARY KEY (type, id)
    );
  `);

  const salt = randomBytes(16);
  const key = deriveStorageKey(passphrase, salt);
  const insert = db.prepare<[string, Buffer]>("INSERT INTO meta (key, value) VALUES (?, ?)");
  insert.run("salt", Buffer.from(salt));
  insert.run("check", Buffer.from(sealSecret(utf8Encode(CHECK_VALUE), key)));
  db.pragma(`user_version = ${SCHEMA_VERSION}`);
}

export class Wallet implements IdentityStore {
  readonly path: string;
  private _db: Database.Database | null;
  private readonly _storageKey: Uint8Array;

  private constructor(path: string, db: Database.Database, storageKey: Uint8Array) {
    this.path = path;
    this._db = db;
    this._storageKey = storageKey;
  }

  // -- Lifecycle -----------------------------------------------------------

  /**
   * Create a wallet file. An existing wallet is reported, not overwritten.
   */
  static create(
    path: string,
    passphrase: string
  ): Result<WalletCreateOutcome, WalletUnavailableError> {
    if (path === MEMORY_WALLET) {
      return ok("created");
    }
    if (existsSync(path)) {
      return ok("already-exists");
    }
    try {
      mkdirSync(dirname(path), { recursive: true });
      const db = new Database(path);
      try {
        initSchema(db, passphrase);
      } finally {
        db.close();
      }
      return ok("created");
    } catch (e) {
      return err(new WalletUnavailableError(`Could not create wallet: ${errorMessage(e)}`));
    }
  }

  /**
   * Open a wallet. An in-memory wallet is created fresh on open.
   *
   * @throws {WalletUnavailableError} Missing file, unreadable database, or
   *   wrong passphrase.
   */
  static open(path: string, passphrase: string): Wallet {
    if (path !== MEMORY_WALLET && !existsSync(path)) {
      throw new WalletUnavailableError(`Wallet not found: ${path}`);
    }

    let db: Database.Database;
    try {
      db = new Database(path);
      if (path === MEMORY_WALLET) {
        initSchema(db, passphrase);
      } else {
        db.pragma("journal_mode = WAL");
      }
    } catch (e) {
      throw new WalletUnavailableError(`Could not open wallet: ${errorMessage(e)}`);
    }

    const meta = db.prepare<[string], { value: Buffer }>("SELECT value FROM meta WHERE key = ?");
    const salt = meta.get("salt");
    const check = meta.get("check");
    if (salt === undefined || check === undefined) {
      db.close();
      throw new WalletUnavailableError(`Not a wallet: ${path}`);
    }

    const storageKey = deriveStorageKey(passphrase, new Uint8Array(salt.value));
    const opened = openSecret(new Uint8Array(check.value), storageKey);
    if (opened === null || utf8Decode(opened) !== CHECK_VALUE) {
      db.close();
      throw new WalletUnavailableError("Invalid wallet passphrase");
    }
    return new Wallet(path, db, storageKey);
  }

  /**
   * Remove a wallet file (and its WAL side files).
   */
  static delete(path: string): Result<WalletDeleteOutcome, WalletUnavailableError> {
    if (path === MEMORY_WALLET || !existsSync(path)) {
      return ok("not-found");
    }
    try {
      for (const suffix of ["", "-wal", "-shm"]) {
        rmSync(path + suffix, { force: true });
      }
      return ok("deleted");
    } catch (e) {
      return err(new WalletUnavailableError(`Could not delete wallet: ${errorMessage(e)}`));
    }
  }

  get isOpen(): boolean {
    return this._db !== null;
  }

  close(): void {
    if (this._db !== null) {
      this._db.close();
      this._db = null;
    }
  }

  private get db(): Database.Database {
    if (this._db === null) {
      throw new WalletUnavailableError("Wallet is closed");
    }
    return this._db;
  }

  // -- Keys ----------------------------------------------------------------

  storeKey(verkey: string, keypair: Keypair): void {
    this.db
      .prepare<[string, Buffer]>("INSERT OR REPLACE INTO keys (verkey, secret) VALUES (?, ?)")
      .run(verkey, Buffer.from(sealSecret(keypair.seed, this._storageKey)));
  }

  /** Keypair behind a verkey, or null when the wallet does not hold it. */
  getKeypair(verkey: string): Keypair | null {
    const row = this.db
      .prepare<[string], { secret: Buffer }>("SELECT secret FROM keys WHERE verkey = ?")
      .get(verkey);
    if (row === undefined) return null;
    const seed = openSecret(new Uint8Array(row.secret), this._storageKey);
    return seed === null ? null : keypairFromSeed(seed);
  }

  hasKey(verkey: string): boolean {
    return (
      this.db.prepare<[string], { verkey: string }>("SELECT verkey FROM keys WHERE verkey = ?").get(verkey) !==
      undefined
    );
  }

  // -- DIDs ----------------------------------------------------------------

  storeMyDid(did: string, verkey: string): void {
    this.db
      .prepare<[string, string]>(
        "INSERT OR REPLACE INTO dids (did, verkey, mine) VALUES (?, ?, 1)"
      )
      .run(did, verkey);
  }

  /** True when `did` is one of this wallet's own DIDs. */
  isLocalDid(did: string): boolean {
    return (
      this.db
        .prepare<[string], { did: string }>("SELECT did FROM dids WHERE did = ? AND mine = 1")
        .get(did) !== undefined
    );
  }

  /**
   * Record a peer's DID.
   *
   * @throws {AgentError} If the DID is one of ours.
   */
  storeTheirDid(did: string, verkey: string): void {
    if (this.isLocalDid(did)) {
      throw new AgentError(`Refusing to store local DID '${did}' as a peer DID`);
    }
    this.db
      .prepare<[string, string]>(
        "INSERT OR REPLACE INTO dids (did, verkey, mine) VALUES (?, ?, 0)"
      )
      .run(did, verkey);
  }

  async verkeyToDid(verkey: string): Promise<string | null> {
    const row = this.db
      .prepare<[string], { did: string }>(
        "SELECT did FROM dids WHERE verkey = ? ORDER BY mine DESC LIMIT 1"
      )
      .get(verkey);
    return row?.did ?? null;
  }

  async localKeyForDid(did: string): Promise<string> {
    const row = this.db
      .prepare<[string], { verkey: string }>("SELECT verkey FROM dids WHERE did = ? AND mine = 1")
      .get(did);
    if (row === undefined) {
      throw new AgentError(`No local DID '${did}' in wallet`);
    }
    return row.verkey;
  }

  // -- Pairwise ------------------------------------------------------------

  createPairwise(info: PairwiseInfo): void {
    const metadata: JsonObject = {
      their_verkey: info.theirVerkey,
      their_endpoint: info.theirEndpoint,
    };
    if (info.label !== undefined) metadata["label"] = info.label;
    this.storeTheirDid(info.theirDid, info.theirVerkey);
    this.db
      .prepare<[string, string, string]>(
        "INSERT OR REPLACE INTO pairwise (their_did, my_did, metadata) VALUES (?, ?, ?)"
      )
      .run(info.theirDid, info.myDid, JSON.stringify(metadata));
  }

  async pairwiseInfo(theirDid: string): Promise<PairwiseInfo> {
    const row = this.db
      .prepare<[string], PairwiseRow>(
        "SELECT their_did, my_did, metadata FROM pairwise WHERE their_did = ?"
      )
      .get(theirDid);
    if (row === undefined) {
      throw new AgentError(`No pairwise relationship with '${theirDid}'`);
    }
    return toPairwiseInfo(row);
  }

  hasPairwise(theirDid: string): boolean {
    return (
      this.db
        .prepare<[string], { their_did: string }>("SELECT their_did FROM pairwise WHERE their_did = ?")
        .get(theirDid) !== undefined
    );
  }

  listPairwise(): PairwiseInfo[] {
    return this.db
      .prepare<[], PairwiseRow>("SELECT their_did, my_did, metadata FROM pairwise ORDER BY their_did")
      .all()
      .map(toPairwiseInfo);
  }

  // -- Records -------------------------------------------------------------

  addRecord(type: string, id: string, value: JsonObject): void {
    this.db
      .prepare<[string, string, string]>("INSERT INTO records (type, id, value) VALUES (?, ?, ?)")
      .run(type, id, JSON.stringify(value));
  }

  updateRecord(type: string, id: string, value: JsonObject): void {
    this.db
      .prepare<[string, string, string]>("UPDATE records SET value = ? WHERE type = ? AND id = ?")
      .run(JSON.stringify(value), type, id);
  }

  getRecord(type: string, id: string): WalletRecord | null {
    const row = this.db
      .prepare<[string, string], RecordRow>(
        "SELECT type, id, value FROM records WHERE type = ? AND id = ?"
      )
      .get(type, id);
    return row === undefined ? null : toRecord(row);
  }

  listRecords(type: string): WalletRecord[] {
    return this.db
      .prepare<[string], RecordRow>("SELECT type, id, value FROM records WHERE type = ? ORDER BY rowid")
      .all(type)
      .map(toRecord);
  }

  deleteRecord(type: string, id: string): boolean {
    const info = this.db
      .prepare<[string, string]>("DELETE FROM records WHERE type = ? AND id = ?")
      .run(type, id);
    return info.changes > 0;
  }
}

interface PairwiseRow {
  their_did: string;
  my_did: string;
  metadata: string;
}

interface RecordRow {
  type: string;
  id: string;
  value: string;
}

function parseObject(json: string): JsonObject {
  const parsed: unknown = JSON.parse(json);
  return isJsonObject(parsed) ? parsed : {};
}

function toPairwiseInfo(row: PairwiseRow): PairwiseInfo {
  const meta = parseObject(row.metadata);
  const label = meta["label"];
  return {
    myDid: row.my_did,
    theirDid: row.their_did,
    theirVerkey: String(meta["their_verkey"] ?? ""),
    theirEndpoint: String(meta["their_endpoint"] ?? ""),
    ...(typeof label === "string" ? { label } : {}),
  };
}

function toRecord(row: RecordRow): WalletRecord {
  return { type: row.type, id: row.id, value: parseObject(row.value) };
}
