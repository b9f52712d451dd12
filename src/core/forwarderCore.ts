import {
  EmergencyCallerAlreadySet,
  ProtocolAdapterNotStopped,
  ReentrantCall,
  UnauthorizedCaller,
  UnauthorizedLogicRef,
  ZeroNotAllowed,
} from "../errors";
import type { ContractContext } from "../host/contract";
import { ZERO_ADDRESS, isZero, type Address, type Bytes32, type Hex } from "../types";
import { isProtocolAdapter, type ProtocolAdapterView } from "./types";

export interface ForwarderBinding {
  protocolAdapter: Address;
  logicRef: Bytes32;
  emergencyCommittee: Address;
}

const EMERGENCY_CALLER = "emergencyCaller";
const LOCK = "reentrancyLock";

/**
 * Access control, emergency recovery and reentrancy protection shared by
 * every forwarder version. Held by value; versions supply the dispatch.
 *
 * The binding is immutable. The emergency caller lives in storage and can be
 * written exactly once, after the bound adapter has halted.
 */
export class ForwarderCore {
  readonly protocolAdapter: Address;
  readonly logicRef: Bytes32;
  readonly emergencyCommittee: Address;

  constructor(
    private readonly ctx: ContractContext,
    binding: ForwarderBinding,
    readonly version: string,
  ) {
    if (isZero(binding.protocolAdapter)) throw new ZeroNotAllowed("protocolAdapter");
    if (isZero(binding.logicRef)) throw new ZeroNotAllowed("logicRef");
    if (isZero(binding.emergencyCommittee)) throw new ZeroNotAllowed("emergencyCommittee");
    this.protocolAdapter = binding.protocolAdapter;
    this.logicRef = binding.logicRef;
    this.emergencyCommittee = binding.emergencyCommittee;
  }

  /** Returns undefined until the committee sets it. */
  emergencyCaller(): Address | undefined {
    return this.ctx.loadHex(EMERGENCY_CALLER);
  }

  adapter(): ProtocolAdapterView {
    return this.ctx.world.resolve(this.protocolAdapter, isProtocolAdapter, "protocol adapter");
  }

  forwardCall(logicRef: Bytes32, input: Hex, dispatch: (input: Hex) => Hex): Hex {
    const caller = this.ctx.sender();
    if (caller !== this.protocolAdapter) throw new UnauthorizedCaller(this.protocolAdapter, caller);
    if (logicRef !== this.logicRef) throw new UnauthorizedLogicRef(this.logicRef, logicRef);
    return this.nonReentrant(() => dispatch(input));
  }

  forwardEmergencyCall(input: Hex, dispatch: (input: Hex) => Hex): Hex {
    const caller = this.ctx.sender();
    const expected = this.emergencyCaller() ?? ZERO_ADDRESS;
    if (expected === ZERO_ADDRESS || caller !== expected)
      throw new UnauthorizedCaller(expected, caller);
    this.ctx.log.warn("emergency call", { forwarder: this.ctx.address, caller });
    return this.nonReentrant(() => dispatch(input));
  }

  setEmergencyCaller(caller: Address): void {
    const sender = this.ctx.sender();
    if (sender !== this.emergencyCommittee)
      throw new UnauthorizedCaller(this.emergencyCommittee, sender);
    if (isZero(caller)) throw new ZeroNotAllowed("emergencyCaller");
    if (!this.ctx.call(() => this.adapter().isHalted()))
      throw new ProtocolAdapterNotStopped(this.protocolAdapter);
    const current = this.emergencyCaller();
    if (current !== undefined) throw new EmergencyCallerAlreadySet(current);

    this.ctx.store(EMERGENCY_CALLER, caller);
    this.ctx.emit("EmergencyCallerSet", { emergencyCaller: caller });
    this.ctx.log.warn("emergency caller set", { forwarder: this.ctx.address, caller });
  }

  private nonReentrant(fn: () => Hex): Hex {
    if (this.ctx.loadBool(LOCK)) throw new ReentrantCall(this.ctx.address);
    this.ctx.store(LOCK, true);
    try {
      return fn();
    } finally {
      this.ctx.store(LOCK, false);
    }
  }
}
