/**
 * @logtrack/crypto — hex helpers and the Keccak-256 primitives behind the
 * log hash chain.
 *
 * Hashing uses `@noble/hashes`; chain links are computed exactly like
 * Solidity's `keccak256(abi.encodePacked(bytes32, bytes32))`.
 *
 * @packageDocumentation
 */

import { keccak_256 } from '@noble/hashes/sha3';
import { bytesToHex, concatBytes, hexToBytes } from '@noble/hashes/utils';
import { TrackerError, TrackerErrorCode } from '@logtrack/types';

import type { Hash32, HashPrimitives, HexData } from './types';

export type { Hash32, HashPrimitives, HexData } from './types';

// ─── Constants ──────────────────────────────────────────────────────────────────

/** 32 zero bytes: the virtual predecessor of the first link in every chain. */
export const ZERO_HASH: Hash32 = '0x' + '00'.repeat(32);

// ─── Hex helpers ────────────────────────────────────────────────────────────────

/** Strip a 0x or 0X prefix if present. */
export function strip0x(hex: string): string {
  return hex.startsWith('0x') || hex.startsWith('0X') ? hex.slice(2) : hex;
}

/**
 * Encode bytes as 0x-prefixed lowercase hex.
 *
 * @example
 * ```typescript
 * toHex(new Uint8Array([255, 0])); // '0xff00'
 * ```
 */
export function toHex(data: Uint8Array): HexData {
  return '0x' + bytesToHex(data);
}

/**
 * Decode hex (with or without 0x prefix) into bytes.
 *
 * @throws {TrackerError} `INVALID_HEX` on odd length or non-hex characters.
 */
export function fromHex(hex: string): Uint8Array {
  const clean = strip0x(hex);
  if (clean.length % 2 !== 0 || !/^[0-9a-fA-F]*$/.test(clean)) {
    throw new TrackerError(TrackerErrorCode.INVALID_HEX, `Invalid hex string: ${JSON.stringify(hex)}`, {
      hint: 'Hex strings must have even length and contain only 0-9 and a-f.',
    });
  }
  return hexToBytes(clean);
}

/**
 * Validate and normalise a 32-byte hash to lowercase 0x form.
 *
 * @param name - Field name reported in the error.
 * @throws {TrackerError} `INVALID_HASH` when the value is not 32 bytes of hex.
 */
export function toHash32(value: string, name = 'hash'): Hash32 {
  const clean = strip0x(value);
  if (!/^[0-9a-fA-F]{64}$/.test(clean)) {
    throw new TrackerError(TrackerErrorCode.INVALID_HASH, `${name} must be 32 bytes of hex`, {
      context: { field: name, value },
    });
  }
  return '0x' + clean.toLowerCase();
}

// ─── Hashing ────────────────────────────────────────────────────────────────────

/** Keccak-256 of `data` as a {@link Hash32}. */
export function keccak256(data: Uint8Array): Hash32 {
  return toHex(keccak_256(data));
}

/**
 * One link of the log hash chain: `keccak256(prev ‖ value)` over the raw
 * 32-byte inputs.
 */
export function linkHash(prev: Hash32, value: Hash32): Hash32 {
  return keccak256(concatBytes(fromHex(toHash32(prev, 'prev')), fromHex(toHash32(value, 'value'))));
}

/** Keccak-256 chain links and Keccak-256 of the raw value bytes. */
export const defaultHashPrimitives: HashPrimitives = {
  link: linkHash,
  valueHash: keccak256,
};
