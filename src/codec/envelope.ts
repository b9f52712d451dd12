// ABI envelope for forwarder inputs:
//   (uint8 callType, address token, uint128 amount) ‖ call-type-specific tail

import type { Result } from "ethers";
import { abi } from "../core/hash";
import type {
  CallKind,
  CallOf,
  ForwarderCall,
  MigrateCall,
  MigrateKind,
  UnwrapCall,
  WrapCall,
} from "../core/types";
import { AmountOverflow, InvalidInputLength, MalformedInput, UnknownCallType } from "../errors";
import { MAX_U128, asAddress, asBytes32, asHex, type Address, type Hex } from "../types";
import { fromHex } from "../utils/bytes";

const WORD = 32;
export const PREFIX_LENGTH = 3 * WORD;
export const UNWRAP_TAIL_LENGTH = WORD;
export const MIGRATE_TAIL_LENGTH = 4 * WORD;
const WRAP_HEAD_LENGTH = 5 * WORD; // static fields + signature offset

const PREFIX = ["uint8", "address", "uint128"];
const UNWRAP_TAIL = ["address"];
const MIGRATE_TAIL = ["bytes32", "bytes32", "bytes32", "address"];
const WRAP_TAIL = ["uint256", "uint256", "address", "bytes32", "bytes"];

interface Prefix {
  token: Address;
  amount: bigint;
}

/* ── field readers ───────────────────────────────────────── */

const decodeWords = (types: string[], data: Uint8Array): Result => {
  try {
    return abi.decode(types, data);
  } catch (err) {
    throw new MalformedInput(err instanceof Error ? err.message : String(err));
  }
};

const uint = (value: unknown, field: string): bigint => {
  if (typeof value !== "bigint") throw new MalformedInput(`${field} is not an integer`);
  return value;
};

const text = (value: unknown, field: string): string => {
  if (typeof value !== "string") throw new MalformedInput(`${field} is not a hex string`);
  return value;
};

const checkU128 = (amount: bigint): bigint => {
  if (amount > MAX_U128) throw new AmountOverflow(amount, MAX_U128);
  return amount;
};

const expectLength = (tail: Uint8Array, expected: number): void => {
  if (tail.length !== expected) throw new InvalidInputLength(expected, tail.length);
};

/* ── tails ───────────────────────────────────────────────── */

const decodeWrapTail = (kind: "wrap", p: Prefix, tail: Uint8Array): WrapCall => {
  if (tail.length < WRAP_HEAD_LENGTH + WORD)
    throw new InvalidInputLength(WRAP_HEAD_LENGTH + WORD, tail.length);
  const offset = uint(decodeWords(["uint256"], tail.subarray(4 * WORD, 5 * WORD))[0], "offset");
  if (offset !== BigInt(WRAP_HEAD_LENGTH))
    throw new MalformedInput(`signature offset ${offset}, expected ${WRAP_HEAD_LENGTH}`);
  const sigLength = uint(
    decodeWords(["uint256"], tail.subarray(WRAP_HEAD_LENGTH, WRAP_HEAD_LENGTH + WORD))[0],
    "signature length",
  );
  const padded = ((sigLength + BigInt(WORD - 1)) / BigInt(WORD)) * BigInt(WORD);
  expectLength(tail, Number(BigInt(WRAP_HEAD_LENGTH + WORD) + padded));
  const w = decodeWords(WRAP_TAIL, tail);
  const signature = asHex(text(w[4], "signature"));
  return {
    type: kind,
    ...p,
    nonce: uint(w[0], "nonce"),
    deadline: uint(w[1], "deadline"),
    owner: asAddress(text(w[2], "owner")),
    actionTreeRoot: asBytes32(text(w[3], "actionTreeRoot")),
    signature,
  };
};

const decodeUnwrapTail = (kind: "unwrap", p: Prefix, tail: Uint8Array): UnwrapCall => {
  expectLength(tail, UNWRAP_TAIL_LENGTH);
  const [receiver] = decodeWords(UNWRAP_TAIL, tail);
  return { type: kind, ...p, receiver: asAddress(text(receiver, "receiver")) };
};

const decodeMigrateTail = <K extends MigrateKind>(
  kind: K,
  p: Prefix,
  tail: Uint8Array,
): MigrateCall<K> => {
  expectLength(tail, MIGRATE_TAIL_LENGTH);
  const m = decodeWords(MIGRATE_TAIL, tail);
  return {
    type: kind,
    ...p,
    nullifier: asBytes32(text(m[0], "nullifier")),
    commitmentTreeRoot: asBytes32(text(m[1], "commitmentTreeRoot")),
    logicRef: asBytes32(text(m[2], "logicRef")),
    forwarder: asAddress(text(m[3], "forwarder")),
  };
};

type TailDecoder<K extends CallKind> = (kind: K, p: Prefix, tail: Uint8Array) => CallOf<K>;

const TAILS: { [K in CallKind]: TailDecoder<K> } = {
  wrap: decodeWrapTail,
  unwrap: decodeUnwrapTail,
  migrate: decodeMigrateTail,
  migrateV1: decodeMigrateTail,
  migrateV2: decodeMigrateTail,
};

const decodeTail = <K extends CallKind>(kind: K, p: Prefix, tail: Uint8Array): CallOf<K> => {
  const decoder: TailDecoder<K> = TAILS[kind];
  return decoder(kind, p, tail);
};

/* ── public codec ────────────────────────────────────────── */

/**
 * Decodes `input` against a closed call layout. A discriminator outside the
 * layout is a conversion error; there is no fallback variant.
 */
export const decodeCall = <K extends CallKind>(input: Hex, layout: readonly K[]): CallOf<K> => {
  const bytes = fromHex(input);
  if (bytes.length < PREFIX_LENGTH) throw new InvalidInputLength(PREFIX_LENGTH, bytes.length);

  // decoded as full words; range checks below
  const head = decodeWords(["uint256", "uint256", "uint256"], bytes.subarray(0, PREFIX_LENGTH));
  const discriminator = uint(head[0], "callType");
  const kind = discriminator < BigInt(layout.length) ? layout[Number(discriminator)] : undefined;
  if (kind === undefined) throw new UnknownCallType(discriminator, layout);

  const tokenWord = uint(head[1], "token");
  if (tokenWord >> 160n !== 0n) throw new MalformedInput("token word has dirty upper bits");
  const prefix: Prefix = {
    token: asAddress(`0x${tokenWord.toString(16).padStart(40, "0")}`),
    amount: checkU128(uint(head[2], "amount")),
  };
  return decodeTail(kind, prefix, bytes.subarray(PREFIX_LENGTH));
};

const encodeTail = (call: ForwarderCall): string => {
  switch (call.type) {
    case "wrap":
      return abi.encode(WRAP_TAIL, [
        call.nonce,
        call.deadline,
        call.owner,
        call.actionTreeRoot,
        call.signature,
      ]);
    case "unwrap":
      return abi.encode(UNWRAP_TAIL, [call.receiver]);
    case "migrate":
    case "migrateV1":
    case "migrateV2":
      return abi.encode(MIGRATE_TAIL, [
        call.nullifier,
        call.commitmentTreeRoot,
        call.logicRef,
        call.forwarder,
      ]);
  }
};

/** Encodes `call` with the discriminator it has in `layout`. */
export const encodeCall = (call: ForwarderCall, layout: readonly CallKind[]): Hex => {
  const index = layout.indexOf(call.type);
  if (index < 0) throw new MalformedInput(`${call.type} is not part of [${layout.join(", ")}]`);
  checkU128(call.amount);
  const prefix = abi.encode(PREFIX, [index, call.token, call.amount]);
  return asHex(prefix + encodeTail(call).slice(2));
};
