export * from "./types";
export * from "./errors";
export { makeLogger, silentLogger, type ILogger } from "./logging";
export { loadConfig, loggerFromConfig, type Config } from "./config";

export { World, type Account, type WorldOptions } from "./host/world";
export { Contract, ContractContext } from "./host/contract";
export {
  Erc20,
  FeeOnTransferErc20,
  NoReturnErc20,
  FalseReturnErc20,
  isErc20,
  safeTransfer,
  safeTransferFrom,
  type Erc20Like,
} from "./host/erc20";
export {
  SignatureTransfer,
  domainSeparator,
  permitWitnessDigest,
  permitWitnessStructHash,
  type PermitTransferFrom,
  type SignatureTransferDetails,
  type TokenPermissions,
} from "./host/signatureTransfer";
export { ProtocolAdapter, type AdapterTransaction, type ExternalCall } from "./host/protocolAdapter";

export * from "./core/types";
export { calculateLabelRef, witnessHash, WITNESS_TYPESTRING, EMPTY_ROOT } from "./core/hash";
export { ForwarderCore, type ForwarderBinding } from "./core/forwarderCore";
export { WrapUnwrapEngine, expectBalanceDelta } from "./core/engine";
export { NullifierLedger } from "./core/nullifierLedger";
export { MigrationPath, type MigrationAnchor } from "./core/migration";
export { ForwarderV1, type ForwarderV1Params } from "./core/forwarderV1";
export { ForwarderV2, type ForwarderV2Params } from "./core/forwarderV2";
export { ForwarderV3, type ForwarderV3Params } from "./core/forwarderV3";
export { decodeCall, encodeCall, PREFIX_LENGTH } from "./codec/envelope";
export { addressOf, recoverSigner, signDigest, type PrivKey } from "./crypto/secp256k1";
export * from "./deploy";
