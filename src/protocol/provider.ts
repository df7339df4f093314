/**
 * Capabilities the protocol layer consumes but does not implement.
 *
 * The SDK ships a libsodium/SQLite implementation of both (see
 * `sdk/sodium-provider.ts` and `sdk/wallet.ts`); tests and other hosts may
 * supply their own.
 */

/** Result of opening an authenticated-encryption envelope. */
export interface UnpackedEnvelope {
  /** Wire text of the inner message. */
  readonly message: string;
  readonly recipientVerkey: string;
  /** Absent when the envelope was packed anonymously. */
  readonly senderVerkey?: string;
}

export interface LocalIdentity {
  readonly did: string;
  readonly verkey: string;
}

export interface CryptoProvider {
  /** Detached signature over `data` with the secret key behind `verkey`. */
  sign(verkey: string, data: Uint8Array): Promise<Uint8Array>;
  /** False on a bad signature or unusable key; never throws for those. */
  verify(verkey: string, data: Uint8Array, signature: Uint8Array): Promise<boolean>;
  /**
   * Encrypt `plaintext` to every recipient. Omitting `senderVerkey` yields an
   * anonymous envelope; providing it yields a sender-authenticated one.
   */
  packEnvelope(
    recipientVerkeys: readonly string[],
    senderVerkey: string | undefined,
    plaintext: string
  ): Promise<Uint8Array>;
  unpackEnvelope(envelope: Uint8Array): Promise<UnpackedEnvelope>;
  /** Fresh signing key, returned by its verkey. */
  createKey(): Promise<string>;
  /** Fresh DID with its own signing key. */
  createLocalIdentity(): Promise<LocalIdentity>;
}

/** A peer-specific relationship established by a completed handshake. */
export interface PairwiseInfo {
  readonly myDid: string;
  readonly theirDid: string;
  readonly theirVerkey: string;
  readonly theirEndpoint: string;
  readonly label?: string;
}

export interface IdentityStore {
  /** DID known for a verkey (ours or a peer's), or null if none. */
  verkeyToDid(verkey: string): Promise<string | null>;
  /** Verkey of one of our own DIDs. */
  localKeyForDid(did: string): Promise<string>;
  pairwiseInfo(theirDid: string): Promise<PairwiseInfo>;
}
