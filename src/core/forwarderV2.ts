import { decodeCall } from "../codec/envelope";
import { Contract } from "../host/contract";
import type { World } from "../host/world";
import type { Address, Bytes32, Hex } from "../types";
import { WrapUnwrapEngine } from "./engine";
import { ForwarderCore } from "./forwarderCore";
import type { ForwarderV1Params } from "./forwarderV1";
import { MigrationPath, type MigrationAnchor } from "./migration";
import { EMPTY_OUTPUT, V2_CALLS, type V1MigratingForwarder } from "./types";

export interface ForwarderV2Params extends ForwarderV1Params {
  /** V1 forwarder whose adapter has been halted. */
  forwarderV1: Address;
}

/** Second generation: wrap, unwrap, and migration out of a halted V1. */
export class ForwarderV2 extends Contract implements V1MigratingForwarder {
  private readonly core: ForwarderCore;
  private readonly engine: WrapUnwrapEngine;
  private readonly fromV1: MigrationPath;

  constructor(world: World, address: Address, params: ForwarderV2Params) {
    super(world, address);
    this.core = new ForwarderCore(this.ctx, params, "2.0.0");
    this.engine = new WrapUnwrapEngine(this.ctx, params.signatureTransfer);
    this.fromV1 = new MigrationPath(this.ctx, this.engine, params.forwarderV1, "nf:v1");
  }

  forwardCall(logicRef: Bytes32, input: Hex): Hex {
    return this.core.forwardCall(logicRef, input, (i) => this.dispatch(i));
  }

  forwardEmergencyCall(input: Hex): Hex {
    return this.core.forwardEmergencyCall(input, (i) => this.dispatch(i));
  }

  setEmergencyCaller(caller: Address): void {
    this.core.setEmergencyCaller(caller);
  }

  getProtocolAdapter(): Address {
    return this.core.protocolAdapter;
  }

  getLogicRef(): Bytes32 {
    return this.core.logicRef;
  }

  getEmergencyCommittee(): Address {
    return this.core.emergencyCommittee;
  }

  getEmergencyCaller(): Address | undefined {
    return this.core.emergencyCaller();
  }

  getSignatureTransfer(): Address {
    return this.engine.signatureTransfer;
  }

  getVersion(): string {
    return this.core.version;
  }

  getMigrationAnchorV1(): MigrationAnchor {
    return { ...this.fromV1.anchor };
  }

  isNullifierContained(nullifier: Bytes32): boolean {
    return this.fromV1.ledger.isContained(nullifier);
  }

  nullifierCount(): bigint {
    return this.fromV1.ledger.count();
  }

  nullifierAtIndex(index: bigint): Bytes32 {
    return this.fromV1.ledger.atIndex(index);
  }

  private dispatch(input: Hex): Hex {
    const call = decodeCall(input, V2_CALLS);
    switch (call.type) {
      case "wrap":
        this.engine.wrap(call);
        break;
      case "unwrap":
        this.engine.unwrap(call);
        break;
      case "migrate":
        this.fromV1.migrate(call);
        break;
    }
    return EMPTY_OUTPUT;
  }
}
