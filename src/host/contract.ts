import type { ILogger } from "../logging";
import type { Address, Hex, Slot } from "../types";
import type { Account, World } from "./world";

/**
 * Storage, sender and event access for one contract address.
 * Shared by a contract and the components it is composed of.
 */
export class ContractContext {
  constructor(
    readonly world: World,
    readonly address: Address,
    readonly log: ILogger,
  ) {}

  sender(): Address {
    return this.world.sender();
  }

  now(): bigint {
    return this.world.timestamp;
  }

  /** Outgoing call with this contract as the sender. */
  call<T>(fn: () => T): T {
    return this.world.call(this.address, fn);
  }

  emit(name: string, args: Record<string, Slot>): void {
    this.world.emit({ emitter: this.address, name, args });
  }

  loadBigint(key: string): bigint {
    const value = this.world.load(this.address, key);
    return typeof value === "bigint" ? value : 0n;
  }

  loadBool(key: string): boolean {
    return this.world.load(this.address, key) === true;
  }

  loadHex(key: string): Hex | undefined {
    const value = this.world.load(this.address, key);
    return typeof value === "string" ? value : undefined;
  }

  store(key: string, value: Slot): void {
    this.world.store(this.address, key, value);
  }
}

export abstract class Contract implements Account {
  protected readonly ctx: ContractContext;

  protected constructor(world: World, readonly address: Address, log: ILogger = world.log) {
    this.ctx = new ContractContext(world, address, log);
  }
}
