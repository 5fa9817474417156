import { describe, it, expect } from "vitest";
import { keccak_256 as keccak } from "@noble/hashes/sha3";
import { hashPair, leafOf, processProof, verify } from "../src/core/merkle";
import type { Hash256 } from "../src/core/types";
import { bytesToHex, hexToBytes } from "../src/utils/bytes";
import { ALICE, BOB, CAROL, DAVE, ERIN, account } from "./helpers/accounts";
import { buildTree } from "./helpers/merkleTree";

describe("Merkle verifier", () => {
  it("leaf is keccak256 of the raw address bytes, case-insensitive", () => {
    const expected = bytesToHex(keccak(Buffer.from("00".repeat(19) + "01", "hex")));
    expect(leafOf(ALICE)).toBe(expected);
    expect(leafOf("0x00000000000000000000000000000000000000AB")).toBe(
      leafOf("0x00000000000000000000000000000000000000ab"),
    );
  });

  it("hashes pairs smaller-first", () => {
    const a = hexToBytes(leafOf(ALICE));
    const b = hexToBytes(leafOf(BOB));
    const [lo, hi] = Buffer.compare(a, b) <= 0 ? [a, b] : [b, a];
    const expected = keccak(Buffer.concat([lo, hi]));

    expect(Buffer.from(hashPair(a, b))).toEqual(Buffer.from(expected));
    expect(Buffer.from(hashPair(b, a))).toEqual(Buffer.from(expected));
  });

  it("two-leaf root is the sorted pair hash of both leaves", () => {
    const { root, proof } = buildTree([ALICE, BOB]);
    const expected = bytesToHex(
      hashPair(hexToBytes(leafOf(ALICE)), hexToBytes(leafOf(BOB))),
    );
    expect(root).toBe(expected);
    expect(proof(ALICE)).toEqual([leafOf(BOB)]);
    expect(verify(root, proof(ALICE), leafOf(ALICE))).toBe(true);
  });

  it("verifies every member of an odd-sized tree", () => {
    const members = [ALICE, BOB, CAROL, DAVE, ERIN];
    const { root, proof } = buildTree(members);
    for (const m of members) expect(verify(root, proof(m), leafOf(m))).toBe(true);
    // ERIN is carried up twice unpaired
    expect(proof(ERIN)).toHaveLength(1);
  });

  it("rejects a non-member, a foreign root and a tampered proof", () => {
    const { root, proof } = buildTree([ALICE, BOB, CAROL]);
    const other = buildTree([DAVE, ERIN]);
    const outsider = account(99);

    expect(verify(root, proof(ALICE), leafOf(outsider))).toBe(false);
    expect(verify(other.root, proof(ALICE), leafOf(ALICE))).toBe(false);

    const tampered: Hash256[] = [...proof(ALICE)];
    tampered[0] = `0x${"11".repeat(32)}`;
    expect(verify(root, tampered, leafOf(ALICE))).toBe(false);
  });

  it("treats malformed hashes as verification failure", () => {
    const { root, proof } = buildTree([ALICE, BOB]);
    expect(verify(root, ["0x1234"], leafOf(ALICE))).toBe(false);
    expect(verify("0xdead", proof(ALICE), leafOf(ALICE))).toBe(false);
    expect(processProof(["0xzz"], leafOf(ALICE))).toBeUndefined();
  });

  it("an empty proof verifies only a single-leaf root", () => {
    const { root, proof } = buildTree([ALICE]);
    expect(root).toBe(leafOf(ALICE));
    expect(proof(ALICE)).toEqual([]);
    expect(verify(root, [], leafOf(ALICE))).toBe(true);
    expect(verify(root, [], leafOf(BOB))).toBe(false);
  });
});
