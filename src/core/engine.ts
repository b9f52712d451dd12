import { BalanceMismatch, ZeroNotAllowed } from "../errors";
import type { ContractContext } from "../host/contract";
import { isErc20, safeTransfer, type Erc20Like } from "../host/erc20";
import { isSignatureTransfer } from "../host/signatureTransfer";
import { isZero, type Address } from "../types";
import { WITNESS_TYPESTRING, witnessHash } from "./hash";
import type { UnwrapCall, WrapCall } from "./types";

/** Fails unless `after - before` is exactly `expected`. */
export const expectBalanceDelta = (expected: bigint, before: bigint, after: bigint): void => {
  const actual = after - before;
  if (actual !== expected) throw new BalanceMismatch(expected, actual);
};

/**
 * Moves tokens into and out of forwarder custody. Each direction measures the
 * forwarder's own balance around the transfer and requires the change to
 * equal the declared amount.
 */
export class WrapUnwrapEngine {
  constructor(
    private readonly ctx: ContractContext,
    readonly signatureTransfer: Address,
  ) {
    if (isZero(signatureTransfer)) throw new ZeroNotAllowed("signatureTransfer");
  }

  token(address: Address): Erc20Like {
    return this.ctx.world.resolve(address, isErc20, "ERC-20");
  }

  balanceOf(token: Erc20Like): bigint {
    return token.balanceOf(this.ctx.address);
  }

  wrap(call: WrapCall): void {
    if (call.amount !== 0n) {
      const token = this.token(call.token);
      const permit2 = this.ctx.world.resolve(
        this.signatureTransfer,
        isSignatureTransfer,
        "signature transfer",
      );
      const before = this.balanceOf(token);
      this.ctx.call(() =>
        permit2.permitWitnessTransferFrom(
          {
            permitted: { token: call.token, amount: call.amount },
            nonce: call.nonce,
            deadline: call.deadline,
          },
          { to: this.ctx.address, requestedAmount: call.amount },
          call.owner,
          witnessHash(call.actionTreeRoot),
          WITNESS_TYPESTRING,
          call.signature,
        ),
      );
      expectBalanceDelta(call.amount, before, this.balanceOf(token));
    }
    this.ctx.emit("Wrapped", { token: call.token, from: call.owner, amount: call.amount });
    this.ctx.log.debug("wrapped", { token: call.token, owner: call.owner, amount: call.amount });
  }

  unwrap(call: UnwrapCall): void {
    if (call.amount !== 0n) {
      const token = this.token(call.token);
      const before = this.balanceOf(token);
      safeTransfer(this.ctx, token, call.receiver, call.amount);
      // decrease is before - after
      expectBalanceDelta(call.amount, this.balanceOf(token), before);
    }
    this.ctx.emit("Unwrapped", { token: call.token, to: call.receiver, amount: call.amount });
    this.ctx.log.debug("unwrapped", { token: call.token, to: call.receiver, amount: call.amount });
  }
}
