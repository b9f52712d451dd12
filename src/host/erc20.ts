import { InsufficientAllowance, InsufficientBalance, TransferFailed } from "../errors";
import { MAX_U256, ZERO_ADDRESS, type Address } from "../types";
import { Contract, type ContractContext } from "./contract";
import type { Account, World } from "./world";

/** The token surface forwarders and the signature-transfer contract rely on. */
export interface Erc20Like extends Account {
  balanceOf(account: Address): bigint;
  // void models tokens that return nothing from transfer functions
  transfer(to: Address, amount: bigint): boolean | void;
  transferFrom(from: Address, to: Address, amount: bigint): boolean | void;
}

export const isErc20 = (account: Account): account is Erc20Like =>
  "balanceOf" in account &&
  typeof account.balanceOf === "function" &&
  "transfer" in account &&
  typeof account.transfer === "function" &&
  "transferFrom" in account &&
  typeof account.transferFrom === "function";

/* ── safe transfers: a missing return is success, `false` is failure ── */

export const safeTransfer = (
  ctx: ContractContext,
  token: Erc20Like,
  to: Address,
  amount: bigint,
): void => {
  if (ctx.call(() => token.transfer(to, amount)) === false)
    throw new TransferFailed(token.address);
};

export const safeTransferFrom = (
  ctx: ContractContext,
  token: Erc20Like,
  from: Address,
  to: Address,
  amount: bigint,
): void => {
  if (ctx.call(() => token.transferFrom(from, to, amount)) === false)
    throw new TransferFailed(token.address);
};

/** Plain in-process fungible token; anyone may mint. */
export class Erc20 extends Contract implements Erc20Like {
  constructor(
    world: World,
    address: Address,
    readonly symbol: string,
    readonly decimals = 18,
  ) {
    super(world, address);
  }

  totalSupply(): bigint {
    return this.ctx.loadBigint("supply");
  }

  balanceOf(account: Address): bigint {
    return this.ctx.loadBigint(`bal:${account}`);
  }

  allowance(owner: Address, spender: Address): bigint {
    return this.ctx.loadBigint(`allow:${owner}:${spender}`);
  }

  mint(to: Address, amount: bigint): void {
    this.ctx.store("supply", this.totalSupply() + amount);
    this.ctx.store(`bal:${to}`, this.balanceOf(to) + amount);
    this.ctx.emit("Transfer", { from: ZERO_ADDRESS, to, value: amount });
  }

  approve(spender: Address, amount: bigint): boolean {
    const owner = this.ctx.sender();
    this.ctx.store(`allow:${owner}:${spender}`, amount);
    this.ctx.emit("Approval", { owner, spender, value: amount });
    return true;
  }

  transfer(to: Address, amount: bigint): boolean | void {
    this.move(this.ctx.sender(), to, amount);
    return true;
  }

  transferFrom(from: Address, to: Address, amount: bigint): boolean | void {
    const spender = this.ctx.sender();
    const allowed = this.allowance(from, spender);
    if (allowed !== MAX_U256) {
      if (allowed < amount) throw new InsufficientAllowance(from, spender, allowed, amount);
      this.ctx.store(`allow:${from}:${spender}`, allowed - amount);
    }
    this.move(from, to, amount);
    return true;
  }

  protected move(from: Address, to: Address, amount: bigint): void {
    const balance = this.balanceOf(from);
    if (balance < amount) throw new InsufficientBalance(from, balance, amount);
    this.ctx.store(`bal:${from}`, balance - amount);
    this.ctx.store(`bal:${to}`, this.balanceOf(to) + amount);
    this.ctx.emit("Transfer", { from, to, value: amount });
  }
}

/** Burns `feeBps` basis points of every transfer; the recipient gets the rest. */
export class FeeOnTransferErc20 extends Erc20 {
  constructor(world: World, address: Address, symbol: string, readonly feeBps: bigint) {
    super(world, address, symbol);
  }

  protected override move(from: Address, to: Address, amount: bigint): void {
    const fee = (amount * this.feeBps) / 10_000n;
    const balance = this.balanceOf(from);
    if (balance < amount) throw new InsufficientBalance(from, balance, amount);
    this.ctx.store(`bal:${from}`, balance - amount);
    this.ctx.store(`bal:${to}`, this.balanceOf(to) + amount - fee);
    this.ctx.store("supply", this.totalSupply() - fee);
    this.ctx.emit("Transfer", { from, to, value: amount - fee });
  }
}

/** Moves funds but returns nothing, like several early mainnet tokens. */
export class NoReturnErc20 extends Erc20 {
  override transfer(to: Address, amount: bigint): void {
    super.transfer(to, amount);
  }

  override transferFrom(from: Address, to: Address, amount: bigint): void {
    super.transferFrom(from, to, amount);
  }
}

/** Signals failure with `false` instead of throwing, and moves nothing. */
export class FalseReturnErc20 extends Erc20 {
  override transfer(): boolean {
    return false;
  }

  override transferFrom(): boolean {
    return false;
  }
}
