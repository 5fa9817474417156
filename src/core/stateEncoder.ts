import { keccak_256 } from "@noble/hashes/sha3";
import { encode, type Input as RlpInput } from "rlp";
import {
  asList,
  decAddress,
  decHash,
  decodeItem,
  decUint,
  encHashes,
  encUints,
} from "../codec/rlp";
import { bigintToBytes, bytesToHex, hexToBytes } from "../utils/bytes";
import { LedgerError } from "./errors";
import { isAddress, isHash256 } from "./merkle";
import { claimKey } from "./reducer";
import { MAX_UINT256, type Address, type Hash256, type LedgerState, type UInt256 } from "./types";

const byKey = <V>(m: ReadonlyMap<Address, V>): [Address, V][] =>
  [...m.entries()].sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

/**
 * Snapshot layout: [roots, amounts, balances, claims], each list sorted by
 * key so the encoding does not depend on insertion order.
 *   roots    = [[refunder, [root…]]…]
 *   amounts  = [[refunder, [amount…]]…]
 *   balances = [[refunder, balance]…]
 *   claims   = [[refunder, recipient]…]
 */
export const encodeState = (s: LedgerState): Uint8Array => {
  const roots: RlpInput = byKey(s.roots).map(([r, hs]) => [hexToBytes(r), encHashes(hs)]);
  const amounts: RlpInput = byKey(s.amounts).map(([r, ns]) => [hexToBytes(r), encUints(ns)]);
  const balances: RlpInput = byKey(s.balances).map(([r, b]) => [
    hexToBytes(r),
    bigintToBytes(b),
  ]);
  const claims: RlpInput = [...s.claims]
    .sort()
    .map((k) => k.split(":").map((a) => hexToBytes(`0x${a.slice(2)}`)));
  return encode([roots, amounts, balances, claims]);
};

const invalid = (what: string, details: Record<string, unknown> = {}) =>
  new LedgerError("InvalidInput", `invalid state: ${what}`, details);

const isCanonicalAddress = (k: string): k is Address => isAddress(k) && k === k.toLowerCase();
const isUint256 = (n: UInt256) => n >= 0n && n <= MAX_UINT256;

/**
 * Checks the shape the reducer keeps its state in: lower-cased keys, a
 * non-empty amount list beside every root list and of the same length, no
 * zero balances. Returns the state unchanged.
 */
export const checkState = (s: LedgerState): LedgerState => {
  for (const [refunder, roots] of s.roots) {
    const amounts = s.amounts.get(refunder);
    if (!isCanonicalAddress(refunder))
      throw invalid("refunder is not a lower-case address", { refunder });
    if (roots.length === 0) throw invalid("empty batch list", { refunder });
    if (!amounts || amounts.length !== roots.length)
      throw invalid("roots and amounts differ in length", {
        refunder,
        roots: roots.length,
        amounts: amounts?.length ?? 0,
      });
    if (!roots.every((r) => isHash256(r) && r === r.toLowerCase()))
      throw invalid("root is not a lower-case 32-byte hash", { refunder });
    if (!amounts.every(isUint256)) throw invalid("amount out of range", { refunder });
  }
  for (const refunder of s.amounts.keys())
    if (!s.roots.has(refunder)) throw invalid("amounts without roots", { refunder });

  for (const [refunder, balance] of s.balances) {
    if (!isCanonicalAddress(refunder))
      throw invalid("refunder is not a lower-case address", { refunder });
    if (balance === 0n || !isUint256(balance))
      throw invalid("balance must be in 1..2^256-1", { refunder, balance });
  }

  for (const key of s.claims) {
    const [refunder, recipient, ...rest] = key.split(":");
    if (rest.length > 0 || !isCanonicalAddress(refunder) || !isCanonicalAddress(recipient ?? ""))
      throw invalid("claim is not a refunder:recipient pair", { claim: key });
  }
  return s;
};

/* one entry per key; a repeated key would otherwise collapse silently */
const uniqueMap = <V>(entries: [Address, V][], what: string): Map<Address, V> => {
  const m = new Map(entries);
  if (m.size !== entries.length) throw invalid(`duplicate ${what} entry`);
  return m;
};

export const decodeState = (b: Uint8Array): LedgerState => {
  const [roots, amounts, balances, claims] = asList(decodeItem(b), "state");

  const pairs = (item: typeof roots, what: string) =>
    asList(item, what).map((entry) => asList(entry, what));

  const claimKeys = pairs(claims, "claims").map(([r, c]) =>
    claimKey(decAddress(r), decAddress(c)),
  );
  const claimSet = new Set(claimKeys);
  if (claimSet.size !== claimKeys.length) throw invalid("duplicate claims entry");

  return checkState({
    roots: uniqueMap(
      pairs(roots, "roots").map(([r, hs]): [Address, Hash256[]] => [
        decAddress(r),
        asList(hs, "roots").map((h) => decHash(h)),
      ]),
      "roots",
    ),
    amounts: uniqueMap(
      pairs(amounts, "amounts").map(([r, ns]): [Address, UInt256[]] => [
        decAddress(r),
        asList(ns, "amounts").map((n) => decUint(n)),
      ]),
      "amounts",
    ),
    balances: uniqueMap(
      pairs(balances, "balances").map(([r, n]): [Address, UInt256] => [
        decAddress(r),
        decUint(n, "balance"),
      ]),
      "balances",
    ),
    claims: claimSet,
  });
};

/* ── state root ──────────────────────────────────────────── */
export const computeStateRoot = (s: LedgerState): Hash256 =>
  bytesToHex(keccak_256(encodeState(s)));
