import { encodeCall } from "../codec/envelope";
import {
  InvalidForwarder,
  InvalidMigrationCommitmentTreeRoot,
  InvalidMigrationLogicRef,
  ProtocolAdapterNotStopped,
  ResourceAlreadyConsumed,
  ZeroNotAllowed,
} from "../errors";
import type { ContractContext } from "../host/contract";
import { isZero, type Address, type Bytes32 } from "../types";
import { expectBalanceDelta, type WrapUnwrapEngine } from "./engine";
import { NullifierLedger } from "./nullifierLedger";
import {
  V1_CALLS,
  isEmergencyForwarder,
  isProtocolAdapter,
  type EmergencyForwarder,
  type MigrateCall,
  type ProtocolAdapterView,
} from "./types";

/** Values frozen at construction from a halted predecessor. */
export interface MigrationAnchor {
  forwarder: Address;
  protocolAdapter: Address;
  commitmentTreeRoot: Bytes32;
  logicRef: Bytes32;
}

/**
 * One migration route from a predecessor forwarder whose adapter has been
 * permanently halted. Owns a dedicated nullifier ledger.
 */
export class MigrationPath {
  readonly anchor: MigrationAnchor;
  readonly ledger: NullifierLedger;

  constructor(
    private readonly ctx: ContractContext,
    private readonly engine: WrapUnwrapEngine,
    predecessor: Address,
    namespace: string,
  ) {
    if (isZero(predecessor)) throw new ZeroNotAllowed("predecessorForwarder");
    const forwarder = this.predecessorAt(predecessor);
    const protocolAdapter = ctx.call(() => forwarder.getProtocolAdapter());
    const adapter = this.adapterAt(protocolAdapter);

    // a root read from a live adapter could still move
    if (!ctx.call(() => adapter.isHalted())) throw new ProtocolAdapterNotStopped(protocolAdapter);

    this.anchor = {
      forwarder: predecessor,
      protocolAdapter,
      commitmentTreeRoot: ctx.call(() => adapter.latestCommitmentRoot()),
      logicRef: ctx.call(() => forwarder.getLogicRef()),
    };
    this.ledger = new NullifierLedger(ctx, namespace);
    ctx.log.info("migration anchor frozen", { successor: ctx.address, ...this.anchor });
  }

  migrate(call: MigrateCall): void {
    const { anchor } = this;
    const adapter = this.adapterAt(anchor.protocolAdapter);

    if (this.ctx.call(() => adapter.isContained(call.nullifier)))
      throw new ResourceAlreadyConsumed(call.nullifier);

    // effects before the external call below
    this.ledger.addNullifier(call.nullifier);

    if (call.commitmentTreeRoot !== anchor.commitmentTreeRoot)
      throw new InvalidMigrationCommitmentTreeRoot(anchor.commitmentTreeRoot, call.commitmentTreeRoot);
    if (call.logicRef !== anchor.logicRef)
      throw new InvalidMigrationLogicRef(anchor.logicRef, call.logicRef);
    if (call.forwarder !== anchor.forwarder) throw new InvalidForwarder(anchor.forwarder, call.forwarder);

    this.ctx.emit("Wrapped", { token: call.token, from: anchor.forwarder, amount: call.amount });

    const token = this.engine.token(call.token);
    const before = this.engine.balanceOf(token);
    const predecessor = this.predecessorAt(anchor.forwarder);
    const unwrap = encodeCall(
      { type: "unwrap", token: call.token, amount: call.amount, receiver: this.ctx.address },
      V1_CALLS,
    );
    this.ctx.call(() => predecessor.forwardEmergencyCall(unwrap));
    expectBalanceDelta(call.amount, before, this.engine.balanceOf(token));

    this.ctx.log.info("migrated", {
      forwarder: this.ctx.address,
      from: anchor.forwarder,
      nullifier: call.nullifier,
      amount: call.amount,
    });
  }

  private predecessorAt(address: Address): EmergencyForwarder {
    return this.ctx.world.resolve(address, isEmergencyForwarder, "emergency forwarder");
  }

  private adapterAt(address: Address): ProtocolAdapterView {
    return this.ctx.world.resolve(address, isProtocolAdapter, "protocol adapter");
  }
}
