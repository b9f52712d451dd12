import { NullifierIndexOutOfBounds, PreExistingNullifier } from "../errors";
import type { ContractContext } from "../host/contract";
import { asBytes32, type Bytes32 } from "../types";

/**
 * Append-only set of consumed resource identifiers, kept in the owning
 * contract's storage under its own namespace. There is no removal.
 */
export class NullifierLedger {
  constructor(
    private readonly ctx: ContractContext,
    private readonly namespace: string,
  ) {}

  isContained(nullifier: Bytes32): boolean {
    return this.ctx.loadBool(`${this.namespace}:has:${nullifier}`);
  }

  addNullifier(nullifier: Bytes32): void {
    if (this.isContained(nullifier)) throw new PreExistingNullifier(nullifier);
    const count = this.count();
    this.ctx.store(`${this.namespace}:has:${nullifier}`, true);
    this.ctx.store(`${this.namespace}:at:${count}`, nullifier);
    this.ctx.store(`${this.namespace}:count`, count + 1n);
  }

  count(): bigint {
    return this.ctx.loadBigint(`${this.namespace}:count`);
  }

  atIndex(index: bigint): Bytes32 {
    const stored = index >= 0n ? this.ctx.loadHex(`${this.namespace}:at:${index}`) : undefined;
    if (stored === undefined) throw new NullifierIndexOutOfBounds(index, this.count());
    return asBytes32(stored);
  }
}
