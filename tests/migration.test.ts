import { describe, it, expect } from "vitest";
import { encodeCall } from "../src/codec/envelope";
import { EMPTY_ROOT } from "../src/core/hash";
import { V2_CALLS, type MigrateCall } from "../src/core/types";
import { deployForwarderV2 } from "../src/deploy";
import {
  BalanceMismatch,
  CallToNonContract,
  InsufficientBalance,
  InvalidForwarder,
  InvalidMigrationCommitmentTreeRoot,
  InvalidMigrationLogicRef,
  PreExistingNullifier,
  ProtocolAdapterNotStopped,
  ResourceAlreadyConsumed,
  UnauthorizedCaller,
  ZeroNotAllowed,
} from "../src/errors";
import { FeeOnTransferErc20 } from "../src/host/erc20";
import { ZERO_ADDRESS, type Bytes32 } from "../src/types";
import {
  COMMITTEE,
  DEPLOYER,
  LOGIC_REF,
  LOGIC_REF_V2,
  LOGIC_REF_V3,
  STRANGER,
  forward,
  nullifier,
  revertOf,
  setupV1,
} from "./helpers/fixtures";
import { CM_1, deployLiveV1, setupV2, type V2Env } from "./helpers/migration";

const openEmergency = (env: V2Env): void =>
  env.world.transact(COMMITTEE, () => env.forwarder.setEmergencyCaller(env.forwarderV2.address));

const migrateCall = (
  env: V2Env,
  amount: bigint,
  nf: Bytes32,
  overrides: Partial<MigrateCall<"migrate">> = {},
): MigrateCall<"migrate"> => ({
  type: "migrate",
  token: env.token.address,
  amount,
  nullifier: nf,
  commitmentTreeRoot: env.frozenRoot,
  logicRef: LOGIC_REF,
  forwarder: env.forwarder.address,
  ...overrides,
});

const migrate = (env: V2Env, call: MigrateCall<"migrate">): void =>
  forward(env.world, env.adapterV2, env.forwarderV2, LOGIC_REF_V2, encodeCall(call, V2_CALLS));

/** Runs a migration expected to fail and checks nothing moved. */
const rejected = <E extends Error>(
  env: V2Env,
  call: MigrateCall<"migrate">,
  type: new (...args: never[]) => E,
): E => {
  const err = revertOf(() => migrate(env, call), type);
  expect(env.token.balanceOf(env.forwarder.address)).toBe(1000n);
  expect(env.token.balanceOf(env.forwarderV2.address)).toBe(0n);
  expect(env.forwarderV2.isNullifierContained(call.nullifier)).toBe(false);
  expect(env.forwarderV2.nullifierCount()).toBe(0n);
  return err;
};

describe("migration V1 to V2", () => {
  describe("construction", () => {
    it("freezes the halted predecessor's anchors", () => {
      const env = setupV2(1000n);
      expect(env.frozenRoot).not.toBe(EMPTY_ROOT);
      expect(env.forwarderV2.getMigrationAnchorV1()).toEqual({
        forwarder: env.forwarder.address,
        protocolAdapter: env.adapter.address,
        commitmentTreeRoot: env.frozenRoot,
        logicRef: LOGIC_REF,
      });
      expect(env.forwarderV2.getVersion()).toBe("2.0.0");
      expect(env.forwarderV2.nullifierCount()).toBe(0n);
    });

    it("refuses a predecessor whose adapter is still running", () => {
      const env = setupV1();
      const live = deployLiveV1(env.world, env);
      const err = revertOf(
        () =>
          deployForwarderV2(env.world, DEPLOYER, {
            protocolAdapter: env.adapter.address,
            logicRef: LOGIC_REF_V2,
            emergencyCommittee: COMMITTEE,
            signatureTransfer: env.permit2.address,
            forwarderV1: live.address,
          }),
        ProtocolAdapterNotStopped,
      );
      expect(err.protocolAdapter).toBe(live.getProtocolAdapter());
    });

    it("refuses a zero or non-forwarder predecessor", () => {
      const env = setupV1();
      const params = {
        protocolAdapter: env.adapter.address,
        logicRef: LOGIC_REF_V2,
        emergencyCommittee: COMMITTEE,
        signatureTransfer: env.permit2.address,
      };
      const zero = revertOf(
        () => deployForwarderV2(env.world, DEPLOYER, { ...params, forwarderV1: ZERO_ADDRESS }),
        ZeroNotAllowed,
      );
      expect(zero.field).toBe("predecessorForwarder");
      const notForwarder = revertOf(
        () => deployForwarderV2(env.world, DEPLOYER, { ...params, forwarderV1: env.token.address }),
        CallToNonContract,
      );
      expect(notForwarder.target).toBe(env.token.address);
    });
  });

  describe("migrate", () => {
    it("pulls funds from V1 and records the nullifier", () => {
      const env = setupV2(1000n);
      openEmergency(env);

      migrate(env, migrateCall(env, 1000n, nullifier(1)));

      expect(env.token.balanceOf(env.forwarder.address)).toBe(0n);
      expect(env.token.balanceOf(env.forwarderV2.address)).toBe(1000n);
      expect(env.forwarderV2.isNullifierContained(nullifier(1))).toBe(true);
      expect(env.forwarderV2.nullifierCount()).toBe(1n);
      expect(env.forwarderV2.nullifierAtIndex(0n)).toBe(nullifier(1));
      expect(env.world.events({ emitter: env.forwarderV2.address })).toEqual([
        {
          emitter: env.forwarderV2.address,
          name: "Wrapped",
          args: { token: env.token.address, from: env.forwarder.address, amount: 1000n },
        },
      ]);
      expect(env.world.events({ emitter: env.forwarder.address, name: "Unwrapped" })).toEqual([
        {
          emitter: env.forwarder.address,
          name: "Unwrapped",
          args: { token: env.token.address, to: env.forwarderV2.address, amount: 1000n },
        },
      ]);
    });

    it("migrates separate resources in separate calls", () => {
      const env = setupV2(1000n);
      openEmergency(env);
      migrate(env, migrateCall(env, 600n, nullifier(1)));
      migrate(env, migrateCall(env, 400n, nullifier(2)));

      expect(env.forwarderV2.nullifierCount()).toBe(2n);
      expect(env.forwarderV2.nullifierAtIndex(1n)).toBe(nullifier(2));
      expect(env.token.balanceOf(env.forwarderV2.address)).toBe(1000n);
    });

    it("rejects a second migration of the same resource", () => {
      const env = setupV2(1000n);
      openEmergency(env);
      migrate(env, migrateCall(env, 500n, nullifier(1)));

      const err = revertOf(() => migrate(env, migrateCall(env, 500n, nullifier(1))), PreExistingNullifier);
      expect(err.nullifier).toBe(nullifier(1));
      expect(env.token.balanceOf(env.forwarder.address)).toBe(500n);
    });

    it("rejects a resource already consumed before the halt", () => {
      const env = setupV2(1000n, [nullifier(5)]);
      openEmergency(env);
      const err = rejected(env, migrateCall(env, 1000n, nullifier(5)), ResourceAlreadyConsumed);
      expect(err.nullifier).toBe(nullifier(5));
    });

    it("rejects a commitment tree root other than the frozen one", () => {
      const env = setupV2(1000n);
      openEmergency(env);
      const err = rejected(
        env,
        migrateCall(env, 1000n, nullifier(1), { commitmentTreeRoot: CM_1 }),
        InvalidMigrationCommitmentTreeRoot,
      );
      expect([err.expected, err.actual]).toEqual([env.frozenRoot, CM_1]);
    });

    it("rejects a logic ref other than V1's", () => {
      const env = setupV2(1000n);
      openEmergency(env);
      const err = rejected(
        env,
        migrateCall(env, 1000n, nullifier(1), { logicRef: LOGIC_REF_V3 }),
        InvalidMigrationLogicRef,
      );
      expect([err.expected, err.actual]).toEqual([LOGIC_REF, LOGIC_REF_V3]);
    });

    it("rejects a forwarder other than V1", () => {
      const env = setupV2(1000n);
      openEmergency(env);
      const err = rejected(
        env,
        migrateCall(env, 1000n, nullifier(1), { forwarder: STRANGER }),
        InvalidForwarder,
      );
      expect([err.expected, err.actual]).toEqual([env.forwarder.address, STRANGER]);
    });

    it("fails until the V1 committee names V2 as emergency caller", () => {
      const env = setupV2(1000n);
      const err = rejected(env, migrateCall(env, 1000n, nullifier(1)), UnauthorizedCaller);
      expect([err.expected, err.actual]).toEqual([ZERO_ADDRESS, env.forwarderV2.address]);
    });

    it("rejects a pull that arrives short and leaves V1 untouched", () => {
      const env = setupV2(1000n);
      openEmergency(env);
      const { world } = env;
      const fee = world.deploy(DEPLOYER, (a) => new FeeOnTransferErc20(world, a, "FEE", 100n));
      world.transact(DEPLOYER, () => fee.mint(env.forwarder.address, 1000n));

      const err = rejected(
        env,
        migrateCall(env, 1000n, nullifier(1), { token: fee.address }),
        BalanceMismatch,
      );
      expect([err.expected, err.actual]).toEqual([1000n, 990n]);
      expect(fee.balanceOf(env.forwarder.address)).toBe(1000n);
      expect(fee.balanceOf(env.forwarderV2.address)).toBe(0n);
      expect(world.events({ emitter: env.forwarderV2.address })).toEqual([]);
    });

    it("cannot take more than V1 holds", () => {
      const env = setupV2(1000n);
      openEmergency(env);
      rejected(env, migrateCall(env, 1001n, nullifier(1)), InsufficientBalance);
    });
  });
});
