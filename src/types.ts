/* ─── Primitives ─── */
import * as v from "valibot";

export type Hex = `0x${string}`;
export type Address = Hex; // 20 bytes, lowercase
export type Bytes32 = Hex; // 32 bytes, lowercase

const HEX_RE = /^0x(?:[0-9a-f]{2})*$/;
const ADDRESS_RE = /^0x[0-9a-f]{40}$/;
const BYTES32_RE = /^0x[0-9a-f]{64}$/;

export const MAX_U128 = 2n ** 128n - 1n;
export const MAX_U256 = 2n ** 256n - 1n;

/* ─── Boundary schemas ─── */
export const hexSchema = v.custom<Hex>(
  (value) => typeof value === "string" && HEX_RE.test(value),
  "expected 0x-prefixed lowercase hex bytes",
);
export const addressSchema = v.custom<Address>(
  (value) => typeof value === "string" && ADDRESS_RE.test(value),
  "expected a 20-byte lowercase address",
);
export const bytes32Schema = v.custom<Bytes32>(
  (value) => typeof value === "string" && BYTES32_RE.test(value),
  "expected a 32-byte lowercase word",
);

// Accepts mixed-case input (checksummed addresses, ABI decoder output).
export const asHex = (value: string): Hex => v.parse(hexSchema, value.toLowerCase());
export const asAddress = (value: string): Address =>
  v.parse(addressSchema, value.toLowerCase());
export const asBytes32 = (value: string): Bytes32 =>
  v.parse(bytes32Schema, value.toLowerCase());

export const ZERO_ADDRESS: Address = `0x${"00".repeat(20)}`;
export const ZERO_BYTES32: Bytes32 = `0x${"00".repeat(32)}`;

export const isZero = (value: Hex): boolean => /^0x0*$/.test(value);

/* ─── Storage & events ─── */
export type Slot = bigint | boolean | Hex;

export interface EventLog {
  emitter: Address;
  name: string;
  args: Record<string, Slot>;
}
