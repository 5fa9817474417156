import { keccak_256 } from "@noble/hashes/sha3";
import { concatBytes } from "@noble/hashes/utils";
import { bytesToHex, compareBytes, hexToBytes } from "../utils/bytes";
import type { Address, Hash256 } from "./types";

export const HASH_LENGTH = 32;

const HASH_RE = /^0x[0-9a-fA-F]{64}$/;
const ADDRESS_RE = /^0x[0-9a-fA-F]{40}$/;

export const isHash256 = (v: string): v is Hash256 => HASH_RE.test(v);
export const isAddress = (v: string): v is Address => ADDRESS_RE.test(v);

/* ── sorted-pair node hash ───────────────────────────────── */
export const hashPair = (a: Uint8Array, b: Uint8Array): Uint8Array =>
  compareBytes(a, b) <= 0
    ? keccak_256(concatBytes(a, b))
    : keccak_256(concatBytes(b, a));

/* leaf = keccak256(raw 20 address bytes) */
export const leafOf = (account: Address): Hash256 =>
  bytesToHex(keccak_256(hexToBytes(account)));

/**
 * Fold a proof onto a leaf. Returns undefined when any element is not a
 * 32-byte hash.
 */
export const processProof = (
  proof: readonly Hash256[],
  leaf: Hash256,
): Uint8Array | undefined => {
  if (!isHash256(leaf)) return undefined;
  let node = hexToBytes(leaf);
  for (const sibling of proof) {
    if (!isHash256(sibling)) return undefined;
    node = hashPair(node, hexToBytes(sibling));
  }
  return node;
};

export const verify = (
  root: Hash256,
  proof: readonly Hash256[],
  leaf: Hash256,
): boolean => {
  if (!isHash256(root)) return false;
  const computed = processProof(proof, leaf);
  return computed !== undefined && compareBytes(computed, hexToBytes(root)) === 0;
};
