// RLP encode/decode for commands, inputs and events.

import { decode, encode, type Input as RlpInput } from "rlp";
import { LedgerError } from "../core/errors";
import type {
  Address,
  Command,
  Hash256,
  Input,
  LedgerEvent,
  UInt256,
} from "../core/types";
import { bigintToBytes, bytesToBigint, bytesToHex, hexToBytes } from "../utils/bytes";

export type RlpItem = Uint8Array | RlpItem[];

/* — helpers — */
const malformed = (what: string) =>
  new LedgerError("InvalidInput", `malformed RLP: ${what}`);

export const asList = (item: RlpItem | undefined, what: string): RlpItem[] => {
  if (Array.isArray(item)) return item;
  throw malformed(`${what} is not a list`);
};

export const asBytes = (item: RlpItem | undefined, what: string): Uint8Array => {
  if (item instanceof Uint8Array) return item;
  throw malformed(`${what} is not a byte string`);
};

const fixed = (item: RlpItem | undefined, length: number, what: string): Hash256 => {
  const b = asBytes(item, what);
  if (b.length !== length) throw malformed(`${what} must be ${length} bytes`);
  return bytesToHex(b);
};

export const decAddress = (item: RlpItem | undefined, what = "address"): Address =>
  fixed(item, 20, what);
export const decHash = (item: RlpItem | undefined, what = "hash"): Hash256 =>
  fixed(item, 32, what);
export const decUint = (item: RlpItem | undefined, what = "uint"): UInt256 => {
  const b = asBytes(item, what);
  if (b.length > 32 || (b.length > 0 && b[0] === 0))
    throw malformed(`${what} is not a minimal uint256`);
  return bytesToBigint(b);
};
const decTag = (item: RlpItem | undefined): string =>
  Buffer.from(asBytes(item, "type tag")).toString();

export const encHashes = (hs: readonly Hash256[]): Uint8Array[] => hs.map(hexToBytes);
export const encUints = (ns: readonly UInt256[]): Uint8Array[] => ns.map(bigintToBytes);
const decHashes = (item: RlpItem | undefined, what: string) =>
  asList(item, what).map((h) => decHash(h, what));
const decUints = (item: RlpItem | undefined, what: string) =>
  asList(item, what).map((n) => decUint(n, what));

export const decodeItem = (b: Uint8Array): RlpItem => {
  try {
    return decode(b);
  } catch (cause) {
    throw new LedgerError("InvalidInput", "malformed RLP", {}, { cause });
  }
};

/* — command — */
export const commandToRlp = (c: Command): RlpInput => {
  switch (c.type) {
    case "setBatches":
      return [c.type, encHashes(c.roots), encUints(c.amounts), bigintToBytes(c.incomingFunds)];
    case "increaseBalance":
    case "decreaseBalance":
      return [c.type, bigintToBytes(c.amount)];
    case "refund":
      return [c.type, hexToBytes(c.refunder), encHashes(c.proof)];
    case "removeBatches":
    case "withdraw":
      return [c.type];
  }
};

export const commandFromRlp = (item: RlpItem): Command => {
  const [tag, ...f] = asList(item, "command");
  const type = decTag(tag);
  switch (type) {
    case "setBatches":
      return {
        type,
        roots: decHashes(f[0], "roots"),
        amounts: decUints(f[1], "amounts"),
        incomingFunds: decUint(f[2], "incomingFunds"),
      };
    case "increaseBalance":
    case "decreaseBalance":
      return { type, amount: decUint(f[0], "amount") };
    case "refund":
      return {
        type,
        refunder: decAddress(f[0], "refunder"),
        proof: decHashes(f[1], "proof"),
      };
    case "removeBatches":
    case "withdraw":
      return { type };
    default:
      throw malformed(`unknown command ${JSON.stringify(type)}`);
  }
};

export const encodeCommand = (c: Command): Uint8Array => encode(commandToRlp(c));
export const decodeCommand = (b: Uint8Array): Command => commandFromRlp(decodeItem(b));

/* — input — */
export const encodeInput = ([caller, cmd]: Input): Uint8Array =>
  encode([hexToBytes(caller), commandToRlp(cmd)]);

export const decodeInput = (b: Uint8Array): Input => {
  const [caller, cmd] = asList(decodeItem(b), "input");
  return [decAddress(caller, "caller"), commandFromRlp(cmd ?? [])];
};

/* — event — */
export const encodeEvent = (e: LedgerEvent): Uint8Array => {
  const refunder = hexToBytes(e.refunder);
  switch (e.type) {
    case "BatchesChanged":
      return encode([e.type, refunder, encHashes(e.roots), encUints(e.amounts)]);
    case "BatchesRemoved":
      return encode([
        e.type,
        refunder,
        encHashes(e.roots),
        encUints(e.amounts),
        bigintToBytes(e.balance),
      ]);
    case "Refunded":
      return encode([e.type, refunder, hexToBytes(e.recipient), bigintToBytes(e.amount)]);
    case "BalanceIncreased":
    case "BalanceDecreased":
    case "BalanceWithdrawn":
      return encode([e.type, refunder, bigintToBytes(e.amount)]);
  }
};

export const decodeEvent = (b: Uint8Array): LedgerEvent => {
  const [tag, ...f] = asList(decodeItem(b), "event");
  const type = decTag(tag);
  const refunder = decAddress(f[0], "refunder");
  switch (type) {
    case "BatchesChanged":
      return {
        type,
        refunder,
        roots: decHashes(f[1], "roots"),
        amounts: decUints(f[2], "amounts"),
      };
    case "BatchesRemoved":
      return {
        type,
        refunder,
        roots: decHashes(f[1], "roots"),
        amounts: decUints(f[2], "amounts"),
        balance: decUint(f[3], "balance"),
      };
    case "Refunded":
      return {
        type,
        refunder,
        recipient: decAddress(f[1], "recipient"),
        amount: decUint(f[2], "amount"),
      };
    case "BalanceIncreased":
    case "BalanceDecreased":
    case "BalanceWithdrawn":
      return { type, refunder, amount: decUint(f[1], "amount") };
    default:
      throw malformed(`unknown event ${JSON.stringify(type)}`);
  }
};
