import { decodeCall } from "../codec/envelope";
import { Contract } from "../host/contract";
import type { World } from "../host/world";
import type { Address, Bytes32, Hex } from "../types";
import { WrapUnwrapEngine } from "./engine";
import { ForwarderCore } from "./forwarderCore";
import type { ForwarderV1Params } from "./forwarderV1";
import { MigrationPath, type MigrationAnchor } from "./migration";
import { InvalidForwarder } from "../errors";
import { EMPTY_OUTPUT, V3_CALLS, isV1MigratingForwarder, type EmergencyForwarder } from "./types";

export interface ForwarderV3Params extends ForwarderV1Params {
  /** Must be the V1 that `forwarderV2` migrates from. */
  forwarderV1: Address;
  forwarderV2: Address;
}

/**
 * Third generation. Migrates from the V2 forwarder and, independently, from
 * the V1 forwarder before it; each route has its own anchors and ledger and
 * needs its own adapter halted and emergency caller pointed here.
 */
export class ForwarderV3 extends Contract implements EmergencyForwarder {
  private readonly core: ForwarderCore;
  private readonly engine: WrapUnwrapEngine;
  private readonly fromV1: MigrationPath;
  private readonly fromV2: MigrationPath;

  constructor(world: World, address: Address, params: ForwarderV3Params) {
    super(world, address);
    this.core = new ForwarderCore(this.ctx, params, "3.0.0");
    this.engine = new WrapUnwrapEngine(this.ctx, params.signatureTransfer);
    this.fromV2 = new MigrationPath(this.ctx, this.engine, params.forwarderV2, "nf:v2");

    const v2 = world.resolve(params.forwarderV2, isV1MigratingForwarder, "V2 forwarder");
    const lineageV1 = this.ctx.call(() => v2.getMigrationAnchorV1().forwarder);
    if (params.forwarderV1 !== lineageV1) throw new InvalidForwarder(lineageV1, params.forwarderV1);
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

  getMigrationAnchorV2(): MigrationAnchor {
    return { ...this.fromV2.anchor };
  }

  isNullifierContainedV1(nullifier: Bytes32): boolean {
    return this.fromV1.ledger.isContained(nullifier);
  }

  isNullifierContainedV2(nullifier: Bytes32): boolean {
    return this.fromV2.ledger.isContained(nullifier);
  }

  private dispatch(input: Hex): Hex {
    const call = decodeCall(input, V3_CALLS);
    switch (call.type) {
      case "wrap":
        this.engine.wrap(call);
        break;
      case "unwrap":
        this.engine.unwrap(call);
        break;
      case "migrateV1":
        this.fromV1.migrate(call);
        break;
      case "migrateV2":
        this.fromV2.migrate(call);
        break;
    }
    return EMPTY_OUTPUT;
  }
}
