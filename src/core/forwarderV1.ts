import { decodeCall } from "../codec/envelope";
import { Contract } from "../host/contract";
import type { World } from "../host/world";
import type { Address, Bytes32, Hex } from "../types";
import { WrapUnwrapEngine } from "./engine";
import { ForwarderCore, type ForwarderBinding } from "./forwarderCore";
import { EMPTY_OUTPUT, V1_CALLS, type EmergencyForwarder } from "./types";

export interface ForwarderV1Params extends ForwarderBinding {
  signatureTransfer: Address;
}

/** First generation: wrap and unwrap only. */
export class ForwarderV1 extends Contract implements EmergencyForwarder {
  private readonly core: ForwarderCore;
  private readonly engine: WrapUnwrapEngine;

  constructor(world: World, address: Address, params: ForwarderV1Params) {
    super(world, address);
    this.core = new ForwarderCore(this.ctx, params, "1.0.0");
    this.engine = new WrapUnwrapEngine(this.ctx, params.signatureTransfer);
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

  private dispatch(input: Hex): Hex {
    const call = decodeCall(input, V1_CALLS);
    switch (call.type) {
      case "wrap":
        this.engine.wrap(call);
        break;
      case "unwrap":
        this.engine.unwrap(call);
        break;
    }
    return EMPTY_OUTPUT;
  }
}
