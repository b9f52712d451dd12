import type { Address, Bytes32 } from "./types";

export type ErrorCategory =
  | "access"
  | "accounting"
  | "state"
  | "migration"
  | "decoding"
  | "collaborator";

/**
 * Base class of every failure raised inside a world call frame.
 * The frame that observes the throw rolls its state back and rethrows.
 */
export abstract class ForwarderError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/* ── access ─────────────────────────────────────────────── */

export class UnauthorizedCaller extends ForwarderError {
  readonly category = "access";
  constructor(readonly expected: Address, readonly actual: Address) {
    super(`unauthorized caller: expected ${expected}, got ${actual}`);
  }
}

export class UnauthorizedLogicRef extends ForwarderError {
  readonly category = "access";
  constructor(readonly expected: Bytes32, readonly actual: Bytes32) {
    super(`unauthorized logic ref: expected ${expected}, got ${actual}`);
  }
}

export class ZeroNotAllowed extends ForwarderError {
  readonly category = "access";
  constructor(readonly field: string) {
    super(`${field} must not be zero`);
  }
}

export class ReentrantCall extends ForwarderError {
  readonly category = "access";
  constructor(readonly target: Address) {
    super(`reentrant call into ${target}`);
  }
}

/* ── accounting ─────────────────────────────────────────── */

export class BalanceMismatch extends ForwarderError {
  readonly category = "accounting";
  constructor(readonly expected: bigint, readonly actual: bigint) {
    super(`balance delta mismatch: expected ${expected}, got ${actual}`);
  }
}

export class AmountOverflow extends ForwarderError {
  readonly category = "accounting";
  constructor(readonly value: bigint, readonly max: bigint) {
    super(`amount ${value} exceeds ${max}`);
  }
}

/* ── state ──────────────────────────────────────────────── */

export class PreExistingNullifier extends ForwarderError {
  readonly category = "state";
  constructor(readonly nullifier: Bytes32) {
    super(`nullifier ${nullifier} already exists`);
  }
}

export class NullifierIndexOutOfBounds extends ForwarderError {
  readonly category = "state";
  constructor(readonly index: bigint, readonly count: bigint) {
    super(`nullifier index ${index} out of bounds (count ${count})`);
  }
}

export class ResourceAlreadyConsumed extends ForwarderError {
  readonly category = "state";
  constructor(readonly nullifier: Bytes32) {
    super(`resource ${nullifier} was already consumed by the predecessor adapter`);
  }
}

export class EmergencyCallerAlreadySet extends ForwarderError {
  readonly category = "state";
  constructor(readonly emergencyCaller: Address) {
    super(`emergency caller already set to ${emergencyCaller}`);
  }
}

export class ProtocolAdapterNotStopped extends ForwarderError {
  readonly category = "state";
  constructor(readonly protocolAdapter: Address) {
    super(`protocol adapter ${protocolAdapter} is not stopped`);
  }
}

export class ProtocolAdapterStopped extends ForwarderError {
  readonly category = "state";
  constructor(readonly protocolAdapter: Address) {
    super(`protocol adapter ${protocolAdapter} is stopped`);
  }
}

/* ── migration integrity ────────────────────────────────── */

export class InvalidMigrationCommitmentTreeRoot extends ForwarderError {
  readonly category = "migration";
  constructor(readonly expected: Bytes32, readonly actual: Bytes32) {
    super(`invalid migration commitment tree root: expected ${expected}, got ${actual}`);
  }
}

export class InvalidMigrationLogicRef extends ForwarderError {
  readonly category = "migration";
  constructor(readonly expected: Bytes32, readonly actual: Bytes32) {
    super(`invalid migration logic ref: expected ${expected}, got ${actual}`);
  }
}

export class InvalidForwarder extends ForwarderError {
  readonly category = "migration";
  constructor(readonly expected: Address, readonly actual: Address) {
    super(`invalid forwarder: expected ${expected}, got ${actual}`);
  }
}

/* ── decoding ───────────────────────────────────────────── */

export class UnknownCallType extends ForwarderError {
  readonly category = "decoding";
  constructor(readonly value: bigint, readonly variants: readonly string[]) {
    super(`call type ${value} is not one of [${variants.join(", ")}]`);
  }
}

export class InvalidInputLength extends ForwarderError {
  readonly category = "decoding";
  constructor(readonly expected: number, readonly actual: number) {
    super(`invalid input length: expected ${expected}, got ${actual}`);
  }
}

export class MalformedInput extends ForwarderError {
  readonly category = "decoding";
  constructor(readonly reason: string) {
    super(`malformed input: ${reason}`);
  }
}

/* ── collaborators ──────────────────────────────────────── */

export class CallToNonContract extends ForwarderError {
  readonly category = "collaborator";
  constructor(readonly target: Address, readonly expectedKind: string) {
    super(`${target} is not a ${expectedKind} contract`);
  }
}

export class TransferFailed extends ForwarderError {
  readonly category = "collaborator";
  constructor(readonly token: Address) {
    super(`token ${token} reported a failed transfer`);
  }
}

export class InsufficientBalance extends ForwarderError {
  readonly category = "collaborator";
  constructor(readonly account: Address, readonly balance: bigint, readonly needed: bigint) {
    super(`${account} holds ${balance}, needs ${needed}`);
  }
}

export class InsufficientAllowance extends ForwarderError {
  readonly category = "collaborator";
  constructor(readonly owner: Address, readonly spender: Address, readonly allowance: bigint, readonly needed: bigint) {
    super(`${spender} may spend ${allowance} of ${owner}, needs ${needed}`);
  }
}

export class SignatureExpired extends ForwarderError {
  readonly category = "collaborator";
  constructor(readonly deadline: bigint) {
    super(`signature expired at ${deadline}`);
  }
}

export class InvalidNonce extends ForwarderError {
  readonly category = "collaborator";
  constructor() {
    super("permit nonce already used");
  }
}

export class InvalidAmount extends ForwarderError {
  readonly category = "collaborator";
  constructor(readonly maxAmount: bigint) {
    super(`requested amount exceeds permitted ${maxAmount}`);
  }
}

export class InvalidSigner extends ForwarderError {
  readonly category = "collaborator";
  constructor() {
    super("permit signature does not match owner");
  }
}

export class ForwarderCallOutputMismatch extends ForwarderError {
  readonly category = "collaborator";
  constructor(readonly expected: string, readonly actual: string) {
    super(`forwarder output mismatch: expected ${expected}, got ${actual}`);
  }
}

export class Unauthorized extends ForwarderError {
  readonly category = "collaborator";
  constructor(readonly caller: Address) {
    super(`${caller} is not allowed to perform this action`);
  }
}
