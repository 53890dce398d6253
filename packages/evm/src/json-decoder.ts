/**
 * Outcome decoder for UTF-8 JSON outcome documents.
 *
 * A document looks like:
 *
 * ```json
 * {
 *   "kind": "return",
 *   "message": { "caller": "0x…", "to": "0x…", "sequenceNum": "7", "value": "0", "data": "0x" },
 *   "logs": [{ "address": "0x…", "topics": ["0x…"], "data": "0x…" }],
 *   "returnData": "0x"
 * }
 * ```
 *
 * Integers are decimal or 0x-hex strings so that 256-bit values survive
 * JSON. `logs` is required for `stop` and `return`; `returnData` for
 * `return` and `revert`.
 */

import { toHash32 } from '@logtrack/crypto';
import {
  TrackerError,
  TrackerErrorCode,
  isAddress,
  isHash32,
  isHexData,
  isIntegerString,
  isPlainObject,
  toError,
} from '@logtrack/types';

import { MAX_LOG_TOPICS } from './types';
import type { EvmLog, EvmMessage, EvmOutcome, OutcomeDecoder } from './types';

function fail(message: string, cause?: unknown): never {
  throw new TrackerError(TrackerErrorCode.OUTCOME_DECODE_FAILED, message, cause !== undefined ? { cause } : undefined);
}

function readAddress(value: unknown, field: string): string {
  if (!isAddress(value)) fail(`${field} must be a 20-byte hex address`);
  return value.toLowerCase();
}

function readHexData(value: unknown, field: string): string {
  if (!isHexData(value)) fail(`${field} must be 0x-prefixed hex bytes`);
  return value.toLowerCase();
}

function readUint(value: unknown, field: string): bigint {
  if (!isIntegerString(value)) fail(`${field} must be a decimal or 0x-hex integer string`);
  return BigInt(value);
}

function readMessage(value: unknown): EvmMessage {
  if (!isPlainObject(value)) fail('message must be an object');
  return {
    caller: readAddress(value['caller'], 'message.caller'),
    to: readAddress(value['to'], 'message.to'),
    sequenceNum: readUint(value['sequenceNum'], 'message.sequenceNum'),
    value: readUint(value['value'], 'message.value'),
    data: readHexData(value['data'], 'message.data'),
  };
}

function readLog(value: unknown, index: number): EvmLog {
  const at = `logs[${index}]`;
  if (!isPlainObject(value)) fail(`${at} must be an object`);
  const topics = value['topics'];
  if (!Array.isArray(topics) || topics.length > MAX_LOG_TOPICS) {
    fail(`${at}.topics must be an array of at most ${MAX_LOG_TOPICS} hashes`);
  }
  return {
    address: readAddress(value['address'], `${at}.address`),
    topics: topics.map((topic: unknown, i: number) => {
      if (!isHash32(topic)) fail(`${at}.topics[${i}] must be a 32-byte hash`);
      return toHash32(topic);
    }),
    data: readHexData(value['data'], `${at}.data`),
  };
}

function readLogs(value: unknown): EvmLog[] {
  if (!Array.isArray(value)) fail('logs must be an array');
  return value.map((log: unknown, i: number) => readLog(log, i));
}

/**
 * {@link OutcomeDecoder} for JSON outcome documents.
 *
 * @example
 * ```typescript
 * const outcome = new JsonOutcomeDecoder().decode(raw);
 * if (outcome.kind !== 'revert') console.log(outcome.logs.length);
 * ```
 */
export class JsonOutcomeDecoder implements OutcomeDecoder {
  private readonly textDecoder = new TextDecoder('utf-8', { fatal: true });

  decode(raw: Uint8Array): EvmOutcome {
    let doc: unknown;
    try {
      doc = JSON.parse(this.textDecoder.decode(raw));
    } catch (err) {
      fail(`outcome is not UTF-8 JSON: ${toError(err).message}`, err);
    }
    if (!isPlainObject(doc)) fail('outcome must be a JSON object');

    const message = readMessage(doc['message']);
    const kind = doc['kind'];
    switch (kind) {
      case 'stop':
        return { kind: 'stop', message, logs: readLogs(doc['logs']) };
      case 'return':
        return {
          kind: 'return',
          message,
          logs: readLogs(doc['logs']),
          returnData: readHexData(doc['returnData'], 'returnData'),
        };
      case 'revert':
        return { kind: 'revert', message, returnData: readHexData(doc['returnData'], 'returnData') };
      default:
        return fail(`unknown outcome kind: ${JSON.stringify(kind)}`);
    }
  }
}

/** Serialise an outcome into the document {@link JsonOutcomeDecoder} reads. */
export function encodeJsonOutcome(outcome: EvmOutcome): Uint8Array {
  const message = {
    caller: outcome.message.caller,
    to: outcome.message.to,
    sequenceNum: outcome.message.sequenceNum.toString(),
    value: outcome.message.value.toString(),
    data: outcome.message.data,
  };
  const doc =
    outcome.kind === 'revert'
      ? { kind: outcome.kind, message, returnData: outcome.returnData }
      : outcome.kind === 'return'
        ? { kind: outcome.kind, message, logs: outcome.logs, returnData: outcome.returnData }
        : { kind: outcome.kind, message, logs: outcome.logs };
  return new TextEncoder().encode(JSON.stringify(doc));
}
