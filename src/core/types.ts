export type Hex = `0x${string}`;
export type Address = Hex;
export type Hash256 = Hex;
export type UInt256 = bigint;

export const MAX_UINT256: UInt256 = 2n ** 256n - 1n;

/* ── per-refunder registry ───────────────────────────────── */
export type BatchSet = {
  roots: readonly Hash256[];
  amounts: readonly UInt256[];
};

/* `${refunder}:${recipient}`, both lower-cased */
export type ClaimKey = `${Address}:${Address}`;

/* ── ledger state: four keyed maps, replaced on every write ─ */
export type LedgerState = {
  readonly roots: ReadonlyMap<Address, readonly Hash256[]>;
  readonly amounts: ReadonlyMap<Address, readonly UInt256[]>;
  readonly balances: ReadonlyMap<Address, UInt256>;
  readonly claims: ReadonlySet<ClaimKey>;
};

export const emptyState = (): LedgerState => ({
  roots: new Map(),
  amounts: new Map(),
  balances: new Map(),
  claims: new Set(),
});

/* ── mutating operations ─────────────────────────────────── */
export type Command =
  | {
      type: "setBatches";
      roots: readonly Hash256[];
      amounts: readonly UInt256[];
      incomingFunds: UInt256;
    }
  | { type: "increaseBalance"; amount: UInt256 }
  | { type: "decreaseBalance"; amount: UInt256 }
  | { type: "removeBatches" }
  | { type: "refund"; refunder: Address; proof: readonly Hash256[] }
  | { type: "withdraw" };

export type CommandType = Command["type"];

/* caller + command, as delivered by the execution boundary */
export type Input = [Address, Command];

/* ── notifications for off-chain indexers ────────────────── */
export type LedgerEvent =
  | {
      type: "BatchesChanged";
      refunder: Address;
      roots: readonly Hash256[];
      amounts: readonly UInt256[];
    }
  | { type: "BalanceIncreased"; refunder: Address; amount: UInt256 }
  | { type: "BalanceDecreased"; refunder: Address; amount: UInt256 }
  | {
      type: "BatchesRemoved";
      refunder: Address;
      roots: readonly Hash256[];
      amounts: readonly UInt256[];
      balance: UInt256;
    }
  | {
      type: "Refunded";
      refunder: Address;
      recipient: Address;
      amount: UInt256;
    }
  | { type: "BalanceWithdrawn"; refunder: Address; amount: UInt256 };

export type EventType = LedgerEvent["type"];

/* value owed to an identity once state has been updated */
export type Payout = { to: Address; amount: UInt256 };

export type Outcome = {
  state: LedgerState;
  event: LedgerEvent;
  payout?: Payout;
};

export type ClaimableBatch = { index: number; amount: UInt256 };
