/** 0x-prefixed, lowercase, 64-hex-digit encoding of 32 bytes. */
export type Hash32 = string;

/** 0x-prefixed hex encoding of arbitrary bytes. */
export type HexData = string;

/**
 * The two hash primitives the commitment scheme is built from.
 *
 * `link` must match the host chain's on-chain computation byte for byte,
 * since verifiers there recompute the chain.
 */
export interface HashPrimitives {
  /** Extend a hash chain: `H(prev ‖ value)` over two 32-byte inputs. */
  link(prev: Hash32, value: Hash32): Hash32;
  /** Content hash of one raw log value. */
  valueHash(raw: Uint8Array): Hash32;
}
