import { keccak_256 } from "@noble/hashes/sha3";
import { sha256 } from "@noble/hashes/sha256";
import { utf8ToBytes } from "@noble/hashes/utils";
import { concat } from "uint8arrays";
import { AbiCoder } from "ethers";
import { asBytes32, asHex, type Address, type Bytes32 } from "../types";
import { fromHex, toHex } from "../utils/bytes";

export const abi = AbiCoder.defaultAbiCoder();

/** Accepts raw bytes or hex strings such as ABI coder output. */
export const keccak = (data: string | Uint8Array): Bytes32 =>
  asBytes32(toHex(keccak_256(typeof data === "string" ? fromHex(asHex(data)) : data)));

/** keccak256 of a UTF-8 type string, as used for EIP-712 type hashes. */
export const typeHash = (typeString: string): Bytes32 => keccak(utf8ToBytes(typeString));

/* ── Merkle helper ───────────────────────────────────────── */
export const EMPTY_ROOT: Bytes32 = keccak(new Uint8Array());

export const merkle = (leaves: Uint8Array[]): Uint8Array => {
  if (leaves.length === 0) return fromHex(EMPTY_ROOT);
  if (leaves.length === 1) return leaves[0];
  const next: Uint8Array[] = [];
  for (let i = 0; i < leaves.length; i += 2) {
    const left = leaves[i];
    const right = i + 1 < leaves.length ? leaves[i + 1] : left;
    next.push(keccak_256(concat([left, right])));
  }
  return merkle(next);
};

/* ── permit witness ──────────────────────────────────────── */
export const WITNESS_TYPE = "Witness(bytes32 actionTreeRoot)";
export const WITNESS_TYPESTRING =
  "Witness witness)TokenPermissions(address token,uint256 amount)Witness(bytes32 actionTreeRoot)";

/** EIP-712 hash of the `Witness` struct for one action tree root. */
export const witnessHash = (actionTreeRoot: Bytes32): Bytes32 =>
  keccak(abi.encode(["bytes32", "bytes32"], [typeHash(WITNESS_TYPE), actionTreeRoot]));

/** Resource label for tokens custodied by `forwarder`: sha256(forwarder ‖ token). */
export const calculateLabelRef = (forwarder: Address, token: Address): Bytes32 =>
  asBytes32(toHex(sha256(concat([fromHex(forwarder), fromHex(token)]))));
