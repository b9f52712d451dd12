import { loadConfig, loggerFromConfig, type Config } from "./config";
import { ForwarderV1, type ForwarderV1Params } from "./core/forwarderV1";
import { ForwarderV2, type ForwarderV2Params } from "./core/forwarderV2";
import { ForwarderV3, type ForwarderV3Params } from "./core/forwarderV3";
import { Erc20 } from "./host/erc20";
import { ProtocolAdapter } from "./host/protocolAdapter";
import { SignatureTransfer } from "./host/signatureTransfer";
import { World } from "./host/world";
import type { Address } from "./types";

export const createWorld = (config: Config = loadConfig()): World =>
  new World({ chainId: config.chainId, logger: loggerFromConfig(config) });

export const deployToken = (world: World, deployer: Address, symbol: string): Erc20 =>
  world.deploy(deployer, (address) => new Erc20(world, address, symbol));

export const deploySignatureTransfer = (world: World, deployer: Address): SignatureTransfer =>
  world.deploy(deployer, (address) => new SignatureTransfer(world, address));

export const deployProtocolAdapter = (
  world: World,
  deployer: Address,
  owner: Address = deployer,
): ProtocolAdapter => world.deploy(deployer, (address) => new ProtocolAdapter(world, address, owner));

export const deployForwarderV1 = (
  world: World,
  deployer: Address,
  params: ForwarderV1Params,
): ForwarderV1 => world.deploy(deployer, (address) => new ForwarderV1(world, address, params));

export const deployForwarderV2 = (
  world: World,
  deployer: Address,
  params: ForwarderV2Params,
): ForwarderV2 => world.deploy(deployer, (address) => new ForwarderV2(world, address, params));

export const deployForwarderV3 = (
  world: World,
  deployer: Address,
  params: ForwarderV3Params,
): ForwarderV3 => world.deploy(deployer, (address) => new ForwarderV3(world, address, params));
