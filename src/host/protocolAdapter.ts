import { EMPTY_ROOT, merkle } from "../core/hash";
import { NullifierLedger } from "../core/nullifierLedger";
import { isForwarder, type ProtocolAdapterView } from "../core/types";
import { ForwarderCallOutputMismatch, ProtocolAdapterStopped, Unauthorized } from "../errors";
import { asBytes32, asHex, type Address, type Bytes32, type Hex } from "../types";
import { fromHex, toHex } from "../utils/bytes";
import { Contract } from "./contract";
import type { World } from "./world";

export interface ExternalCall {
  forwarder: Address;
  logicRef: Bytes32;
  input: Hex;
  expectedOutput: Hex;
}

/** A verified transaction, reduced to what the forwarders observe. */
export interface AdapterTransaction {
  nullifiers: Bytes32[];
  commitments: Bytes32[];
  calls: ExternalCall[];
}

/**
 * In-process stand-in for the protocol adapter. Proof verification is out of
 * scope: `execute` trusts its input and only keeps the consumption ledger,
 * the commitment tree and the forwarder calls in order.
 */
export class ProtocolAdapter extends Contract implements ProtocolAdapterView {
  private readonly nullifiers: NullifierLedger;

  constructor(world: World, address: Address, readonly owner: Address) {
    super(world, address);
    this.nullifiers = new NullifierLedger(this.ctx, "nf");
  }

  isHalted(): boolean {
    return this.ctx.loadBool("halted");
  }

  isContained(nullifier: Bytes32): boolean {
    return this.nullifiers.isContained(nullifier);
  }

  latestCommitmentRoot(): Bytes32 {
    const root = this.ctx.loadHex("root");
    return root === undefined ? EMPTY_ROOT : asBytes32(root);
  }

  commitmentCount(): bigint {
    return this.ctx.loadBigint("cm:count");
  }

  /** One-way: a halted adapter never resumes. */
  emergencyStop(): void {
    const caller = this.ctx.sender();
    if (caller !== this.owner) throw new Unauthorized(caller);
    if (this.isHalted()) throw new ProtocolAdapterStopped(this.address);
    this.ctx.store("halted", true);
    this.ctx.emit("EmergencyStopped", {});
    this.ctx.log.warn("protocol adapter halted", { adapter: this.address });
  }

  execute(tx: AdapterTransaction): void {
    if (this.isHalted()) throw new ProtocolAdapterStopped(this.address);

    for (const nf of tx.nullifiers) this.nullifiers.addNullifier(nf);
    if (tx.commitments.length > 0) this.appendCommitments(tx.commitments);

    for (const call of tx.calls) {
      const forwarder = this.ctx.world.resolve(call.forwarder, isForwarder, "forwarder");
      const output = this.ctx.call(() => forwarder.forwardCall(call.logicRef, call.input));
      if (asHex(output) !== asHex(call.expectedOutput))
        throw new ForwarderCallOutputMismatch(call.expectedOutput, output);
    }
    this.ctx.emit("TransactionExecuted", {
      nullifiers: BigInt(tx.nullifiers.length),
      commitments: BigInt(tx.commitments.length),
      calls: BigInt(tx.calls.length),
    });
  }

  private appendCommitments(commitments: Bytes32[]): void {
    let count = this.commitmentCount();
    for (const cm of commitments) this.ctx.store(`cm:${count++}`, cm);
    this.ctx.store("cm:count", count);

    const leaves: Uint8Array[] = [];
    for (let i = 0n; i < count; i++) {
      const leaf = this.ctx.loadHex(`cm:${i}`);
      if (leaf !== undefined) leaves.push(fromHex(leaf));
    }
    this.ctx.store("root", toHex(merkle(leaves)));
  }
}
