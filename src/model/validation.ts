import {
  array,
  bigint,
  literal,
  maxValue,
  minValue,
  object,
  optional,
  pipe,
  regex,
  safeParse,
  string,
  transform,
  variant,
  type BaseIssue,
} from "valibot";
import { LedgerError } from "../core/errors";
import { MAX_UINT256, type Address, type Command, type Hash256 } from "../core/types";

export const hash256Schema = pipe(
  string(),
  regex(/^0x[0-9a-fA-F]{64}$/, "expected a 32-byte 0x-prefixed hash"),
  transform((s): Hash256 => `0x${s.slice(2).toLowerCase()}`),
);

export const addressSchema = pipe(
  string(),
  regex(/^0x[0-9a-fA-F]{40}$/, "expected a 20-byte 0x-prefixed address"),
  transform((s): Address => `0x${s.slice(2).toLowerCase()}`),
);

export const uint256Schema = pipe(
  bigint(),
  minValue(0n, "amount must not be negative"),
  maxValue(MAX_UINT256, "amount must fit in 256 bits"),
);

export const commandSchema = variant("type", [
  object({
    type: literal("setBatches"),
    roots: array(hash256Schema),
    amounts: array(uint256Schema),
    incomingFunds: optional(uint256Schema, 0n),
  }),
  object({ type: literal("increaseBalance"), amount: uint256Schema }),
  object({ type: literal("decreaseBalance"), amount: uint256Schema }),
  object({ type: literal("removeBatches") }),
  object({
    type: literal("refund"),
    refunder: addressSchema,
    proof: array(hash256Schema),
  }),
  object({ type: literal("withdraw") }),
]);

const describeIssues = (issues: readonly BaseIssue<unknown>[]): string =>
  issues
    .map((i) => {
      const path = i.path?.map((p) => String(p.key)).join(".");
      return path ? `${path}: ${i.message}` : i.message;
    })
    .join("; ");

export const parseCommand = (raw: unknown): Command => {
  const result = safeParse(commandSchema, raw);
  if (!result.success)
    throw new LedgerError("InvalidInput", describeIssues(result.issues), {
      input: raw,
    });
  return result.output;
};

export const parseAddress = (raw: unknown): Address => {
  const result = safeParse(addressSchema, raw);
  if (!result.success)
    throw new LedgerError("InvalidInput", describeIssues(result.issues), {
      input: raw,
    });
  return result.output;
};
