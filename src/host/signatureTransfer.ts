import { concat } from "uint8arrays";
import { InvalidAmount, InvalidNonce, InvalidSigner, SignatureExpired } from "../errors";
import { abi, keccak, typeHash } from "../core/hash";
import { recoverSigner } from "../crypto/secp256k1";
import type { Address, Bytes32, Hex } from "../types";
import { fromHex } from "../utils/bytes";
import { Contract } from "./contract";
import { isErc20, safeTransferFrom } from "./erc20";
import type { Account, World } from "./world";

export interface TokenPermissions {
  token: Address;
  amount: bigint;
}

export interface PermitTransferFrom {
  permitted: TokenPermissions;
  nonce: bigint;
  deadline: bigint;
}

export interface SignatureTransferDetails {
  to: Address;
  requestedAmount: bigint;
}

/** Pull-with-witness primitive consumed by the wrap path. */
export interface SignatureTransferLike extends Account {
  permitWitnessTransferFrom(
    permit: PermitTransferFrom,
    details: SignatureTransferDetails,
    owner: Address,
    witness: Bytes32,
    witnessTypeString: string,
    signature: Hex,
  ): void;
}

export const isSignatureTransfer = (account: Account): account is SignatureTransferLike =>
  "permitWitnessTransferFrom" in account &&
  typeof account.permitWitnessTransferFrom === "function";

/* ── EIP-712 hashing, Permit2 layout ─────────────────────── */

const DOMAIN_TYPE = "EIP712Domain(string name,uint256 chainId,address verifyingContract)";
const TOKEN_PERMISSIONS_TYPE = "TokenPermissions(address token,uint256 amount)";
const PERMIT_WITNESS_STUB =
  "PermitWitnessTransferFrom(TokenPermissions permitted,address spender,uint256 nonce,uint256 deadline,";

export const PERMIT2_NAME = "Permit2";

export const domainSeparator = (chainId: bigint, verifyingContract: Address): Bytes32 =>
  keccak(
    abi.encode(
      ["bytes32", "bytes32", "uint256", "address"],
      [typeHash(DOMAIN_TYPE), typeHash(PERMIT2_NAME), chainId, verifyingContract],
    ),
  );

export interface PermitWitnessMessage {
  permit: PermitTransferFrom;
  spender: Address;
  witness: Bytes32;
  witnessTypeString: string;
}

export const permitWitnessStructHash = (m: PermitWitnessMessage): Bytes32 => {
  const permissions = keccak(
    abi.encode(
      ["bytes32", "address", "uint256"],
      [typeHash(TOKEN_PERMISSIONS_TYPE), m.permit.permitted.token, m.permit.permitted.amount],
    ),
  );
  return keccak(
    abi.encode(
      ["bytes32", "bytes32", "address", "uint256", "uint256", "bytes32"],
      [
        typeHash(PERMIT_WITNESS_STUB + m.witnessTypeString),
        permissions,
        m.spender,
        m.permit.nonce,
        m.permit.deadline,
        m.witness,
      ],
    ),
  );
};

/** The digest an owner signs to authorise `spender` to pull under `permit`. */
export const permitWitnessDigest = (
  chainId: bigint,
  verifyingContract: Address,
  m: PermitWitnessMessage,
): Bytes32 =>
  keccak(
    concat([
      Uint8Array.of(0x19, 0x01),
      fromHex(domainSeparator(chainId, verifyingContract)),
      fromHex(permitWitnessStructHash(m)),
    ]),
  );

/**
 * Signature-based token pulls with unordered nonces.
 * Owners approve this contract once on each token; each pull is authorised by
 * an EIP-712 signature over the permit, the spender and a witness.
 */
export class SignatureTransfer extends Contract implements SignatureTransferLike {
  constructor(world: World, address: Address) {
    super(world, address);
  }

  DOMAIN_SEPARATOR(): Bytes32 {
    return domainSeparator(this.ctx.world.chainId, this.address);
  }

  nonceBitmap(owner: Address, wordPos: bigint): bigint {
    return this.ctx.loadBigint(`nonce:${owner}:${wordPos}`);
  }

  invalidateUnorderedNonces(wordPos: bigint, mask: bigint): void {
    const owner = this.ctx.sender();
    this.ctx.store(`nonce:${owner}:${wordPos}`, this.nonceBitmap(owner, wordPos) | mask);
    this.ctx.emit("UnorderedNonceInvalidation", { owner, word: wordPos, mask });
  }

  permitWitnessTransferFrom(
    permit: PermitTransferFrom,
    details: SignatureTransferDetails,
    owner: Address,
    witness: Bytes32,
    witnessTypeString: string,
    signature: Hex,
  ): void {
    const spender = this.ctx.sender();
    if (this.ctx.now() > permit.deadline) throw new SignatureExpired(permit.deadline);
    if (details.requestedAmount > permit.permitted.amount)
      throw new InvalidAmount(permit.permitted.amount);

    this.useUnorderedNonce(owner, permit.nonce);

    const digest = permitWitnessDigest(this.ctx.world.chainId, this.address, {
      permit,
      spender,
      witness,
      witnessTypeString,
    });
    if (recoverSigner(digest, signature) !== owner) throw new InvalidSigner();

    const token = this.ctx.world.resolve(permit.permitted.token, isErc20, "ERC-20");
    safeTransferFrom(this.ctx, token, owner, details.to, details.requestedAmount);
  }

  private useUnorderedNonce(owner: Address, nonce: bigint): void {
    const wordPos = nonce >> 8n;
    const bit = 1n << (nonce & 0xffn);
    const flipped = this.nonceBitmap(owner, wordPos) ^ bit;
    if ((flipped & bit) === 0n) throw new InvalidNonce();
    this.ctx.store(`nonce:${owner}:${wordPos}`, flipped);
  }
}
