import {
  bytesToHex as toHex,
  hexToBytes as fromHex,
} from "@noble/hashes/utils";
import type { Hex } from "../core/types";

export const bytesToHex = (bytes: Uint8Array): Hex => `0x${toHex(bytes)}`;

export const hexToBytes = (h: Hex): Uint8Array => fromHex(h.slice(2));

/* minimal big-endian encoding, 0n → empty */
export const bigintToBytes = (n: bigint): Uint8Array => {
  if (n === 0n) return new Uint8Array(0);
  const digits = n.toString(16);
  return fromHex(digits.length % 2 ? "0" + digits : digits);
};

export const bytesToBigint = (b: Uint8Array): bigint =>
  b.length === 0 ? 0n : BigInt(bytesToHex(b));

/* unsigned lexicographic order */
export const compareBytes = (a: Uint8Array, b: Uint8Array): number => {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    if (a[i] !== b[i]) return a[i] < b[i] ? -1 : 1;
  }
  return a.length - b.length;
};
