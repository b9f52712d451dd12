import { secp256k1 } from "@noble/curves/secp256k1";
import { keccak_256 } from "@noble/hashes/sha3";
import { asAddress, type Address, type Bytes32, type Hex } from "../types";
import { fromHex, toHex } from "../utils/bytes";

export type PrivKey = Uint8Array;
export type PubKey = Uint8Array;

export const randomPriv = (): PrivKey => secp256k1.utils.randomPrivateKey();

/** Uncompressed (65-byte) public key. */
export const pub = (priv: PrivKey): PubKey => secp256k1.getPublicKey(priv, false);

export const addr = (pubKey: PubKey): Address =>
  asAddress(toHex(keccak_256(pubKey.slice(1)).slice(-20)));

export const addressOf = (priv: PrivKey): Address => addr(pub(priv));

/** 65-byte `r ‖ s ‖ v` signature with v in {27, 28}. */
export const signDigest = (digest: Bytes32, priv: PrivKey): Hex => {
  const sig = secp256k1.sign(fromHex(digest), priv);
  const out = new Uint8Array(65);
  out.set(sig.toCompactRawBytes(), 0);
  out[64] = 27 + sig.recovery;
  return toHex(out);
};

/** Returns null for signatures that do not recover to a point. */
export const recoverSigner = (digest: Bytes32, signature: Hex): Address | null => {
  const raw = fromHex(signature);
  if (raw.length !== 65) return null;
  const v = raw[64];
  const recovery = v >= 27 ? v - 27 : v;
  if (recovery !== 0 && recovery !== 1) return null;
  try {
    const point = secp256k1.Signature.fromCompact(raw.slice(0, 64))
      .addRecoveryBit(recovery)
      .recoverPublicKey(fromHex(digest));
    return addr(point.toRawBytes(false));
  } catch {
    // invalid r/s or point at infinity
    return null;
  }
};
