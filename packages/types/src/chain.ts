/**
 * Chain Types
 *
 * EVM-style primitives shared by every Tessera package.
 *
 * Rules:
 * - Addresses are 20-byte hex strings; packages normalise them to the
 *   checksummed form before using them as keys
 * - Byte payloads are 0x-prefixed hex strings (never Buffers)
 * - Amounts are bigint wei
 */

/**
 * 0x-prefixed hex string. Structurally identical to viem's `Hex`.
 */
export type Hex = `0x${string}`;

/**
 * 20-byte account address. Structurally identical to viem's `Address`.
 */
export type Address = `0x${string}`;

/**
 * 32-byte hash.
 */
export type Bytes32 = Hex;

/**
 * Numeric EVM chain identifier (e.g. 11155111 for Sepolia).
 */
export type ChainId = number;

/**
 * The zero address. Never a valid owner, module or call target.
 */
export const ZERO_ADDRESS: Address = "0x0000000000000000000000000000000000000000";

/**
 * Empty byte payload.
 */
export const EMPTY_BYTES: Hex = "0x";
