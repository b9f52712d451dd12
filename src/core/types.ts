import type { Account } from "../host/world";
import type { MigrationAnchor } from "./migration";
import type { Address, Bytes32, Hex } from "../types";

/* ── decoded forwarder calls ─────────────────────────────── */

export interface WrapCall {
  type: "wrap";
  token: Address;
  amount: bigint;
  nonce: bigint;
  deadline: bigint;
  owner: Address;
  actionTreeRoot: Bytes32;
  signature: Hex;
}

export interface UnwrapCall {
  type: "unwrap";
  token: Address;
  amount: bigint;
  receiver: Address;
}

export type MigrateKind = "migrate" | "migrateV1" | "migrateV2";

export interface MigrateCall<K extends MigrateKind = MigrateKind> {
  type: K;
  token: Address;
  amount: bigint;
  nullifier: Bytes32;
  commitmentTreeRoot: Bytes32;
  logicRef: Bytes32;
  forwarder: Address;
}

export type ForwarderCall =
  | WrapCall
  | UnwrapCall
  | MigrateCall<"migrate">
  | MigrateCall<"migrateV1">
  | MigrateCall<"migrateV2">;

export type CallKind = ForwarderCall["type"];
export type CallOf<K extends CallKind> = Extract<ForwarderCall, { type: K }>;

/*
 * Wire discriminators per version: the index of a kind is its call type.
 * Wrap and unwrap keep positions 0 and 1 in every version.
 */
export const V1_CALLS = ["wrap", "unwrap"] as const;
export const V2_CALLS = ["wrap", "unwrap", "migrate"] as const;
export const V3_CALLS = ["wrap", "unwrap", "migrateV1", "migrateV2"] as const;

export type V1Call = CallOf<(typeof V1_CALLS)[number]>;
export type V2Call = CallOf<(typeof V2_CALLS)[number]>;
export type V3Call = CallOf<(typeof V3_CALLS)[number]>;

/* ── collaborator views ──────────────────────────────────── */

/** What a forwarder reads from its protocol adapter. */
export interface ProtocolAdapterView extends Account {
  isContained(nullifier: Bytes32): boolean;
  isHalted(): boolean;
  latestCommitmentRoot(): Bytes32;
}

export const isProtocolAdapter = (account: Account): account is ProtocolAdapterView =>
  "isContained" in account &&
  typeof account.isContained === "function" &&
  "isHalted" in account &&
  typeof account.isHalted === "function" &&
  "latestCommitmentRoot" in account &&
  typeof account.latestCommitmentRoot === "function";

/** Normal entry point, called by the bound protocol adapter. */
export interface Forwarder extends Account {
  forwardCall(logicRef: Bytes32, input: Hex): Hex;
}

export const isForwarder = (account: Account): account is Forwarder =>
  "forwardCall" in account && typeof account.forwardCall === "function";

/** A forwarder a successor can drain through the emergency path. */
export interface EmergencyForwarder extends Forwarder {
  forwardEmergencyCall(input: Hex): Hex;
  getProtocolAdapter(): Address;
  getLogicRef(): Bytes32;
}

export const isEmergencyForwarder = (account: Account): account is EmergencyForwarder =>
  isForwarder(account) &&
  "forwardEmergencyCall" in account &&
  typeof account.forwardEmergencyCall === "function" &&
  "getProtocolAdapter" in account &&
  typeof account.getProtocolAdapter === "function" &&
  "getLogicRef" in account &&
  typeof account.getLogicRef === "function";

/** A V2 forwarder, read by its V3 successor for the V1 it migrates from. */
export interface V1MigratingForwarder extends EmergencyForwarder {
  getMigrationAnchorV1(): MigrationAnchor;
}

export const isV1MigratingForwarder = (account: Account): account is V1MigratingForwarder =>
  isEmergencyForwarder(account) &&
  "getMigrationAnchorV1" in account &&
  typeof account.getMigrationAnchorV1 === "function";

export const EMPTY_OUTPUT: Hex = "0x";
