import { describe, it, expect } from "vitest";
import fc from "fast-check";
import { NullifierLedger } from "../src/core/nullifierLedger";
import { NullifierIndexOutOfBounds, PreExistingNullifier } from "../src/errors";
import { ContractContext } from "../src/host/contract";
import { World } from "../src/host/world";
import { silentLogger } from "../src/logging";
import { asAddress } from "../src/types";
import { DEPLOYER, nullifier, revertOf } from "./helpers/fixtures";

const OWNER = asAddress(`0x${"0c".repeat(20)}`);

const ledger = (world = new World(), namespace = "nf") =>
  new NullifierLedger(new ContractContext(world, OWNER, silentLogger()), namespace);

describe("NullifierLedger", () => {
  it("starts empty", () => {
    const l = ledger();
    expect(l.count()).toBe(0n);
    expect(l.isContained(nullifier(1))).toBe(false);
  });

  it("records insertion order", () => {
    const l = ledger();
    l.addNullifier(nullifier(3));
    l.addNullifier(nullifier(1));
    expect(l.count()).toBe(2n);
    expect(l.atIndex(0n)).toBe(nullifier(3));
    expect(l.atIndex(1n)).toBe(nullifier(1));
    expect(l.isContained(nullifier(1))).toBe(true);
    expect(l.isContained(nullifier(2))).toBe(false);
  });

  it("rejects a repeated nullifier and keeps the count", () => {
    const l = ledger();
    l.addNullifier(nullifier(1));
    const err = revertOf(() => l.addNullifier(nullifier(1)), PreExistingNullifier);
    expect(err.nullifier).toBe(nullifier(1));
    expect(l.count()).toBe(1n);
  });

  it("rejects indices outside [0, count)", () => {
    const l = ledger();
    l.addNullifier(nullifier(1));
    const past = revertOf(() => l.atIndex(1n), NullifierIndexOutOfBounds);
    expect([past.index, past.count]).toEqual([1n, 1n]);
    const negative = revertOf(() => l.atIndex(-1n), NullifierIndexOutOfBounds);
    expect([negative.index, negative.count]).toEqual([-1n, 1n]);
  });

  it("keeps namespaces on one contract apart", () => {
    const world = new World();
    const v1 = ledger(world, "nf:v1");
    const v2 = ledger(world, "nf:v2");
    v1.addNullifier(nullifier(9));
    expect(v2.isContained(nullifier(9))).toBe(false);
    v2.addNullifier(nullifier(9));
    expect([v1.count(), v2.count()]).toEqual([1n, 1n]);
  });

  it("rolls back with the call frame that inserted", () => {
    const world = new World();
    const l = ledger(world);
    expect(() =>
      world.transact(DEPLOYER, () => {
        l.addNullifier(nullifier(1));
        throw new Error("abort");
      }),
    ).toThrow("abort");
    expect(l.isContained(nullifier(1))).toBe(false);
    expect(l.count()).toBe(0n);
  });

  it("indexes every distinct insertion exactly once", () => {
    fc.assert(
      fc.property(fc.uniqueArray(fc.integer({ min: 0, max: 10_000 }), { maxLength: 40 }), (ids) => {
        const l = ledger();
        ids.forEach((id) => l.addNullifier(nullifier(id)));
        expect(l.count()).toBe(BigInt(ids.length));
        ids.forEach((id, i) => {
          expect(l.atIndex(BigInt(i))).toBe(nullifier(id));
          expect(l.isContained(nullifier(id))).toBe(true);
        });
      }),
      { numRuns: 50 },
    );
  });
});
