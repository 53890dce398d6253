/**
 * @logtrack/evm — packed encoding, message hashing and outcome types for
 * the EVM results a rollup assertion carries.
 *
 * The packed encoders reproduce Solidity's `abi.encodePacked` so that
 * hashes built here match the ones the on-chain verifier computes.
 *
 * @packageDocumentation
 */

import { fromHex, keccak256, strip0x, toHash32 } from '@logtrack/crypto';
import type { Hash32 } from '@logtrack/crypto';
import { TrackerError, TrackerErrorCode } from '@logtrack/types';

import type { Address, EvmLog, EvmMessage, EvmOutcome } from './types';

export type {
  Address,
  EvmMessage,
  EvmLog,
  StopOutcome,
  ReturnOutcome,
  RevertOutcome,
  EvmOutcome,
  OutcomeKind,
  OutcomeDecoder,
} from './types';
export { MAX_LOG_TOPICS } from './types';
export { JsonOutcomeDecoder, encodeJsonOutcome } from './json-decoder';

// ─── Packed encoding ────────────────────────────────────────────────────────────

/**
 * Packed encoding of an unsigned integer of `bits` width, big-endian.
 *
 * @param value - Non-negative bigint that fits in `bits`
 * @param bits - Width in bits, a multiple of 8 up to 256
 * @returns Hex string of `bits / 4` characters (no 0x prefix)
 */
export function packUint(value: bigint, bits: number): string {
  if (bits <= 0 || bits > 256 || bits % 8 !== 0) {
    throw new TrackerError(TrackerErrorCode.INTEGER_OUT_OF_RANGE, `Unsupported integer width: ${bits}`);
  }
  if (value < 0n || value >= 1n << BigInt(bits)) {
    throw new TrackerError(
      TrackerErrorCode.INTEGER_OUT_OF_RANGE,
      `uint${bits} out of range: ${value.toString()}`,
    );
  }
  return value.toString(16).padStart(bits / 4, '0');
}

/**
 * Packed encoding of a bytes32 value.
 * @returns 64-character lowercase hex string (no 0x prefix)
 */
export function packBytes32(hash: string): string {
  return strip0x(toHash32(hash, 'bytes32'));
}

/**
 * Packed encoding of an address: its 20 bytes, unpadded.
 * @returns 40-character lowercase hex string (no 0x prefix)
 */
export function packAddress(address: string): string {
  return strip0x(normalizeAddress(address));
}

/**
 * `keccak256(abi.encodePacked(...))` over already-packed parts.
 *
 * ```ts
 * solidityKeccak(packBytes32(a), packUint(7n, 64));
 * ```
 */
export function solidityKeccak(...packed: string[]): Hash32 {
  return keccak256(fromHex(packed.join('')));
}

// ─── Addresses ──────────────────────────────────────────────────────────────────

/**
 * Validate an address and return it lowercase with a 0x prefix.
 *
 * @throws {TrackerError} `INVALID_ADDRESS` when it is not 20 bytes of hex.
 */
export function normalizeAddress(address: string): Address {
  const clean = strip0x(address);
  if (!/^[0-9a-fA-F]{40}$/.test(clean)) {
    throw new TrackerError(TrackerErrorCode.INVALID_ADDRESS, 'Address must be 20 bytes (40 hex chars)', {
      context: { address },
    });
  }
  return '0x' + clean.toLowerCase();
}

// ─── Messages and outcomes ──────────────────────────────────────────────────────

/**
 * Identifier of a message within one rollup instance:
 * `keccak256(abi.encodePacked(bytes32 instanceId, address to, address caller,
 * uint256 sequenceNum, uint256 value, bytes32 keccak256(data)))`.
 */
export function messageHash(instanceId: Hash32, message: EvmMessage): Hash32 {
  return solidityKeccak(
    packBytes32(instanceId),
    packAddress(message.to),
    packAddress(message.caller),
    packUint(message.sequenceNum, 256),
    packUint(message.value, 256),
    packBytes32(keccak256(fromHex(message.data))),
  );
}

/** Logs carried by an outcome; a revert carries none. */
export function outcomeLogs(outcome: EvmOutcome): readonly EvmLog[] {
  switch (outcome.kind) {
    case 'stop':
    case 'return':
      return outcome.logs;
    case 'revert':
      return [];
    default:
      return assertNever(outcome);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled outcome: ${JSON.stringify(value)}`);
}
