import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import type { Hex } from "../types";

export const toHex = (bytes: Uint8Array): Hex => `0x${bytesToHex(bytes)}`;

export const fromHex = (hex: Hex): Uint8Array => hexToBytes(hex.slice(2));
