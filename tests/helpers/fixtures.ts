import { hexToBytes } from "@noble/hashes/utils";
import { WITNESS_TYPESTRING, witnessHash } from "../../src/core/hash";
import type { ForwarderV1 } from "../../src/core/forwarderV1";
import type { Forwarder, WrapCall } from "../../src/core/types";
import { addressOf, signDigest, type PrivKey } from "../../src/crypto/secp256k1";
import {
  deployForwarderV1,
  deployProtocolAdapter,
  deploySignatureTransfer,
  deployToken,
} from "../../src/deploy";
import type { Erc20 } from "../../src/host/erc20";
import type { ProtocolAdapter } from "../../src/host/protocolAdapter";
import { permitWitnessDigest, type SignatureTransfer } from "../../src/host/signatureTransfer";
import { World } from "../../src/host/world";
import { MAX_U256, asAddress, asBytes32, type Address, type Bytes32, type Hex } from "../../src/types";

const repeat = (byte: string, n: number) => `0x${byte.repeat(n)}`;

export const DEPLOYER = asAddress(repeat("d0", 20));
export const COMMITTEE = asAddress(repeat("c0", 20));
export const BOB = asAddress(repeat("b0", 20));
export const STRANGER = asAddress(repeat("5e", 20));

export const LOGIC_REF = asBytes32(repeat("a1", 32));
export const LOGIC_REF_V2 = asBytes32(repeat("a2", 32));
export const LOGIC_REF_V3 = asBytes32(repeat("a3", 32));
export const ACTION_TREE_ROOT = asBytes32(repeat("77", 32));

export const ALICE_KEY: PrivKey = hexToBytes("11".repeat(32));
export const ALICE = addressOf(ALICE_KEY);

export const nullifier = (n: number): Bytes32 =>
  asBytes32(`0x${n.toString(16).padStart(64, "0")}`);

export interface V1Env {
  world: World;
  token: Erc20;
  permit2: SignatureTransfer;
  adapter: ProtocolAdapter;
  forwarder: ForwarderV1;
}

export const setupV1 = (world = new World()): V1Env => {
  const token = deployToken(world, DEPLOYER, "TKN");
  const permit2 = deploySignatureTransfer(world, DEPLOYER);
  const adapter = deployProtocolAdapter(world, DEPLOYER);
  const forwarder = deployForwarderV1(world, DEPLOYER, {
    protocolAdapter: adapter.address,
    logicRef: LOGIC_REF,
    emergencyCommittee: COMMITTEE,
    signatureTransfer: permit2.address,
  });
  return { world, token, permit2, adapter, forwarder };
};

/** Mints to `owner` and approves the signature-transfer contract without limit. */
export const fund = (
  env: { world: World; token: Erc20; permit2: SignatureTransfer },
  owner: Address,
  amount: bigint,
): void => {
  env.world.transact(DEPLOYER, () => env.token.mint(owner, amount));
  env.world.transact(owner, () => env.token.approve(env.permit2.address, MAX_U256));
};

export interface WrapFields {
  token: Address;
  amount: bigint;
  nonce?: bigint;
  deadline?: bigint;
  actionTreeRoot?: Bytes32;
}

export const signWrap = (
  world: World,
  permit2: SignatureTransfer,
  spender: Address,
  key: PrivKey,
  fields: WrapFields,
): WrapCall => {
  const nonce = fields.nonce ?? 0n;
  const deadline = fields.deadline ?? world.timestamp + 3600n;
  const actionTreeRoot = fields.actionTreeRoot ?? ACTION_TREE_ROOT;
  const digest = permitWitnessDigest(world.chainId, permit2.address, {
    permit: { permitted: { token: fields.token, amount: fields.amount }, nonce, deadline },
    spender,
    witness: witnessHash(actionTreeRoot),
    witnessTypeString: WITNESS_TYPESTRING,
  });
  return {
    type: "wrap",
    token: fields.token,
    amount: fields.amount,
    nonce,
    deadline,
    owner: addressOf(key),
    actionTreeRoot,
    signature: signDigest(digest, key),
  };
};

/** Runs one forwarder call through the adapter, as a verified transaction would. */
export const forward = (
  world: World,
  adapter: ProtocolAdapter,
  forwarder: Forwarder,
  logicRef: Bytes32,
  input: Hex,
  nullifiers: Bytes32[] = [],
): void =>
  world.transact(DEPLOYER, () =>
    adapter.execute({
      nullifiers,
      commitments: [],
      calls: [{ forwarder: forwarder.address, logicRef, input, expectedOutput: "0x" }],
    }),
  );

/** Runs `fn`, expecting it to throw an instance of `type`, and returns that error. */
export const revertOf = <E extends Error>(
  fn: () => unknown,
  type: new (...args: never[]) => E,
): E => {
  try {
    fn();
  } catch (err) {
    if (err instanceof type) return err;
    throw err;
  }
  throw new Error(`expected ${type.name} to be thrown`);
};
