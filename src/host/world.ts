import * as rlp from "rlp";
import { keccak_256 } from "@noble/hashes/sha3";
import { CallToNonContract } from "../errors";
import { silentLogger, type ILogger } from "../logging";
import { asAddress, type Address, type EventLog, type Slot } from "../types";
import { fromHex, toHex } from "../utils/bytes";

/** Anything the world can host at an address. */
export interface Account {
  readonly address: Address;
}

export interface WorldOptions {
  chainId?: bigint;
  timestamp?: bigint;
  logger?: ILogger;
}

type Storage = Map<Address, Map<string, Slot>>;

interface Snapshot {
  storage: Storage;
  logs: number;
  accounts: Set<Address>;
  nonces: Map<Address, bigint>;
}

const cloneStorage = (s: Storage): Storage =>
  new Map([...s].map(([a, slots]) => [a, new Map(slots)]));

/**
 * Deterministic single-threaded execution environment.
 *
 * Every call frame snapshots storage, the event log, deployments and
 * deployer nonces; a throw restores the snapshot and propagates the error
 * unchanged, so a failing call leaves no partial effect behind.
 */
export class World {
  readonly chainId: bigint;
  readonly log: ILogger;
  private now: bigint;
  private storage: Storage = new Map();
  private logs: EventLog[] = [];
  private readonly accounts = new Map<Address, Account>();
  private nonces = new Map<Address, bigint>();
  private readonly senders: Address[] = [];

  constructor(opts: WorldOptions = {}) {
    this.chainId = opts.chainId ?? 1n;
    this.now = opts.timestamp ?? 1_700_000_000n;
    this.log = opts.logger ?? silentLogger();
  }

  /* ── time ────────────────────────────────────────────── */

  get timestamp(): bigint {
    return this.now;
  }

  advanceTime(seconds: bigint): void {
    this.now += seconds;
  }

  /* ── call frames ─────────────────────────────────────── */

  /** Top-level transaction from an externally owned account. */
  transact<T>(from: Address, fn: () => T): T {
    if (this.senders.length !== 0)
      throw new Error("transact() cannot be nested; use call()");
    this.log.debug("tx start", { from });
    return this.call(from, fn);
  }

  /** Runs `fn` as a call frame whose sender is `from`. */
  call<T>(from: Address, fn: () => T): T {
    const snap = this.snapshot();
    this.senders.push(from);
    try {
      return fn();
    } catch (err) {
      this.restore(snap);
      this.log.debug("frame reverted", {
        from,
        depth: this.senders.length,
        error: err instanceof Error ? err.name : String(err),
      });
      throw err;
    } finally {
      this.senders.pop();
    }
  }

  sender(): Address {
    const top = this.senders[this.senders.length - 1];
    if (top === undefined) throw new Error("no active call frame");
    return top;
  }

  /* ── accounts ────────────────────────────────────────── */

  /** CREATE-style address: keccak256(rlp([deployer, nonce]))[12:]. */
  deploy<A extends Account>(deployer: Address, create: (address: Address) => A): A {
    return this.call(deployer, () => {
      const nonce = this.nonces.get(deployer) ?? 0n;
      this.nonces.set(deployer, nonce + 1n);
      const address = asAddress(
        toHex(keccak_256(rlp.encode([fromHex(deployer), nonce])).slice(12)),
      );
      const account = create(address);
      if (account.address !== address)
        throw new Error(`constructor bound ${account.address}, expected ${address}`);
      this.accounts.set(address, account);
      this.log.debug("deployed", { address, deployer });
      return account;
    });
  }

  contractAt(address: Address): Account | undefined {
    return this.accounts.get(address);
  }

  resolve<A extends Account>(
    address: Address,
    guard: (account: Account) => account is A,
    kind: string,
  ): A {
    const account = this.accounts.get(address);
    if (account === undefined || !guard(account)) throw new CallToNonContract(address, kind);
    return account;
  }

  /* ── storage ─────────────────────────────────────────── */

  load(address: Address, key: string): Slot | undefined {
    return this.storage.get(address)?.get(key);
  }

  store(address: Address, key: string, value: Slot): void {
    let slots = this.storage.get(address);
    if (!slots) {
      slots = new Map();
      this.storage.set(address, slots);
    }
    slots.set(key, value);
  }

  /* ── events ──────────────────────────────────────────── */

  emit(event: EventLog): void {
    this.logs.push(event);
    this.log.debug("event", event);
  }

  events(filter?: { emitter?: Address; name?: string }): readonly EventLog[] {
    return this.logs.filter(
      (e) =>
        (filter?.emitter === undefined || e.emitter === filter.emitter) &&
        (filter?.name === undefined || e.name === filter.name),
    );
  }

  /* ── snapshots ───────────────────────────────────────── */

  private snapshot(): Snapshot {
    return {
      storage: cloneStorage(this.storage),
      logs: this.logs.length,
      accounts: new Set(this.accounts.keys()),
      nonces: new Map(this.nonces),
    };
  }

  private restore(snap: Snapshot): void {
    this.storage = snap.storage;
    this.logs.length = snap.logs;
    for (const address of [...this.accounts.keys()])
      if (!snap.accounts.has(address)) this.accounts.delete(address);
    this.nonces = snap.nonces;
  }
}
