import { LedgerError } from "./errors";
import { leafOf, verify } from "./merkle";
import {
  MAX_UINT256,
  type Address,
  type BatchSet,
  type ClaimKey,
  type ClaimableBatch,
  type Command,
  type Hash256,
  type LedgerState,
  type Outcome,
  type UInt256,
} from "./types";

/* ── lookups ─────────────────────────────────────────────── */

export const claimKey = (refunder: Address, recipient: Address): ClaimKey =>
  `${refunder}:${recipient}`;

export const batchesOf = (s: LedgerState, refunder: Address): BatchSet => ({
  roots: s.roots.get(refunder) ?? [],
  amounts: s.amounts.get(refunder) ?? [],
});

export const balanceOf = (s: LedgerState, refunder: Address): UInt256 =>
  s.balances.get(refunder) ?? 0n;

export const hasClaimed = (
  s: LedgerState,
  refunder: Address,
  recipient: Address,
): boolean => s.claims.has(claimKey(refunder, recipient));

/**
 * First batch of `refunder` under which `recipient` can still claim with
 * `proof`. Claims are tracked per (refunder, recipient), so a claimed pair
 * matches nothing.
 */
export const findClaimableBatch = (
  s: LedgerState,
  refunder: Address,
  recipient: Address,
  proof: readonly Hash256[],
): ClaimableBatch | undefined => {
  if (hasClaimed(s, refunder, recipient)) return undefined;
  const { roots, amounts } = batchesOf(s, refunder);
  const leaf = leafOf(recipient);
  const index = roots.findIndex((root) => verify(root, proof, leaf));
  return index < 0 ? undefined : { index, amount: amounts[index] };
};

/* ── copy-on-write helpers ───────────────────────────────── */

const withEntry = <V>(
  m: ReadonlyMap<Address, V>,
  key: Address,
  value: V | undefined,
): ReadonlyMap<Address, V> => {
  const next = new Map(m);
  if (value === undefined) next.delete(key);
  else next.set(key, value);
  return next;
};

const withBalance = (
  s: LedgerState,
  refunder: Address,
  balance: UInt256,
): ReadonlyMap<Address, UInt256> =>
  withEntry(s.balances, refunder, balance === 0n ? undefined : balance);

const credit = (s: LedgerState, refunder: Address, amount: UInt256): UInt256 => {
  const balance = balanceOf(s, refunder) + amount;
  if (balance > MAX_UINT256)
    throw new LedgerError("BalanceOverflow", "balance would exceed 2^256-1", {
      refunder,
      amount,
    });
  return balance;
};

/* ── operations ──────────────────────────────────────────── */

export const setBatches = (
  s: LedgerState,
  caller: Address,
  roots: readonly Hash256[],
  amounts: readonly UInt256[],
  incomingFunds: UInt256,
): Outcome => {
  if (roots.length !== amounts.length)
    throw new LedgerError(
      "LengthMismatch",
      `${roots.length} roots but ${amounts.length} amounts`,
      { refunder: caller, roots: roots.length, amounts: amounts.length },
    );

  const empty = roots.length === 0;
  const balances =
    incomingFunds === 0n
      ? s.balances
      : withBalance(s, caller, credit(s, caller, incomingFunds));

  return {
    state: {
      ...s,
      roots: withEntry(s.roots, caller, empty ? undefined : [...roots]),
      amounts: withEntry(s.amounts, caller, empty ? undefined : [...amounts]),
      balances,
    },
    event: { type: "BatchesChanged", refunder: caller, roots, amounts },
  };
};

export const increaseBalance = (
  s: LedgerState,
  caller: Address,
  amount: UInt256,
): Outcome => {
  if (batchesOf(s, caller).roots.length === 0)
    throw new LedgerError("NoBatches", "no batches registered", {
      refunder: caller,
    });
  return {
    state: { ...s, balances: withBalance(s, caller, credit(s, caller, amount)) },
    event: { type: "BalanceIncreased", refunder: caller, amount },
  };
};

export const decreaseBalance = (
  s: LedgerState,
  caller: Address,
  amount: UInt256,
): Outcome => {
  const balance = balanceOf(s, caller);
  if (amount > balance)
    throw new LedgerError(
      "InsufficientBalance",
      `cannot decrease balance ${balance} by ${amount}`,
      { refunder: caller, balance, amount },
    );
  return {
    state: { ...s, balances: withBalance(s, caller, balance - amount) },
    event: { type: "BalanceDecreased", refunder: caller, amount },
    payout: { to: caller, amount },
  };
};

export const removeBatches = (s: LedgerState, caller: Address): Outcome => {
  const { roots, amounts } = batchesOf(s, caller);
  const balance = balanceOf(s, caller);
  return {
    state: {
      ...s,
      roots: withEntry(s.roots, caller, undefined),
      amounts: withEntry(s.amounts, caller, undefined),
      balances: withBalance(s, caller, 0n),
    },
    event: { type: "BatchesRemoved", refunder: caller, roots, amounts, balance },
    payout: balance === 0n ? undefined : { to: caller, amount: balance },
  };
};

export const refund = (
  s: LedgerState,
  caller: Address,
  refunder: Address,
  proof: readonly Hash256[],
): Outcome => {
  const match = findClaimableBatch(s, refunder, caller, proof);
  if (!match)
    throw new LedgerError("NotRefundable", "proof matches no unclaimed batch", {
      refunder,
      recipient: caller,
    });

  const balance = balanceOf(s, refunder);
  if (match.amount > balance)
    throw new LedgerError(
      "InsufficientFunderBalance",
      `refunder balance ${balance} cannot cover ${match.amount}`,
      { refunder, recipient: caller, index: match.index, balance, amount: match.amount },
    );

  const claims = new Set(s.claims);
  claims.add(claimKey(refunder, caller));
  return {
    state: {
      ...s,
      claims,
      balances: withBalance(s, refunder, balance - match.amount),
    },
    event: { type: "Refunded", refunder, recipient: caller, amount: match.amount },
    payout: { to: caller, amount: match.amount },
  };
};

export const withdraw = (s: LedgerState, caller: Address): Outcome => {
  const balance = balanceOf(s, caller);
  if (balance === 0n)
    throw new LedgerError("NothingToWithdraw", "balance is zero", {
      refunder: caller,
    });
  return {
    state: { ...s, balances: withBalance(s, caller, 0n) },
    event: { type: "BalanceWithdrawn", refunder: caller, amount: balance },
    payout: { to: caller, amount: balance },
  };
};

/* ── command-level reducer ───────────────────────────────── */
export const applyCommand = (
  s: LedgerState,
  caller: Address,
  cmd: Command,
): Outcome => {
  switch (cmd.type) {
    case "setBatches":
      return setBatches(s, caller, cmd.roots, cmd.amounts, cmd.incomingFunds);
    case "increaseBalance":
      return increaseBalance(s, caller, cmd.amount);
    case "decreaseBalance":
      return decreaseBalance(s, caller, cmd.amount);
    case "removeBatches":
      return removeBatches(s, caller);
    case "refund":
      return refund(s, caller, cmd.refunder, cmd.proof);
    case "withdraw":
      return withdraw(s, caller);
  }
};
