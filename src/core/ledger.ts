import { loadConfig } from "../config";
import { makeLogger, type ILogger } from "../logging";
import { parseAddress, parseCommand } from "../model/validation";
import { isLedgerError, LedgerError } from "./errors";
import {
  applyCommand,
  balanceOf,
  batchesOf,
  findClaimableBatch,
  hasClaimed,
} from "./reducer";
import { checkState, computeStateRoot } from "./stateEncoder";
import {
  emptyState,
  type Address,
  type BatchSet,
  type ClaimableBatch,
  type Command,
  type Hash256,
  type Input,
  type LedgerEvent,
  type LedgerState,
  type Payout,
  type UInt256,
} from "./types";

/** Moves value out of the ledger. Throwing rejects the transfer. */
export interface TransferChannel {
  transfer(to: Address, amount: UInt256): void;
}

export type EventSink = (event: LedgerEvent) => void;

export type LedgerOptions = {
  channel: TransferChannel;
  sink?: EventSink;
  logger?: ILogger;
  state?: LedgerState;
};

/* ──────────── ledger shell ──────────── */
export class RefundLedger {
  private state: LedgerState;
  private readonly journal: LedgerEvent[] = [];
  /* events of the outermost operation still in flight */
  private pending: LedgerEvent[] = [];
  private depth = 0;
  private readonly channel: TransferChannel;
  private readonly sink?: EventSink;
  private readonly log: ILogger;

  constructor(opts: LedgerOptions) {
    this.channel = opts.channel;
    this.sink = opts.sink;
    this.state = opts.state ? checkState(opts.state) : emptyState();
    if (opts.logger) {
      this.log = opts.logger;
    } else {
      const config = loadConfig();
      this.log = makeLogger(config.logLevel, config.logPretty);
    }
  }

  /**
   * Apply one command for `caller`. The post-operation state is installed
   * before the payout leaves, so a transfer that calls back into the ledger
   * sees the claim and the reduced balance. If the payout fails, every change
   * since this call began is undone, nested calls included.
   */
  execute(caller: unknown, command: unknown): LedgerEvent {
    const from = parseAddress(caller);
    const cmd = parseCommand(command);
    const event = this.apply(from, cmd);
    this.log.info({ op: cmd.type, caller: from, depth: this.depth }, "committed");
    if (this.depth === 0) this.flush();
    return event;
  }

  /** Applies inputs in order; stops at the first failure. */
  ingest(inputs: readonly Input[]): LedgerEvent[] {
    return inputs.map(([caller, cmd]) => this.execute(caller, cmd));
  }

  /* ---------- operations ---------------------------------------- */

  setBatches(
    caller: Address,
    roots: readonly Hash256[],
    amounts: readonly UInt256[],
    incomingFunds: UInt256 = 0n,
  ): LedgerEvent {
    return this.execute(caller, { type: "setBatches", roots, amounts, incomingFunds });
  }

  increaseBalance(caller: Address, amount: UInt256): LedgerEvent {
    return this.execute(caller, { type: "increaseBalance", amount });
  }

  /** Pays out exactly `amount`; see `withdraw` to empty the balance. */
  decreaseBalance(caller: Address, amount: UInt256): LedgerEvent {
    return this.execute(caller, { type: "decreaseBalance", amount });
  }

  removeBatches(caller: Address): LedgerEvent {
    return this.execute(caller, { type: "removeBatches" });
  }

  refund(caller: Address, refunder: Address, proof: readonly Hash256[]): LedgerEvent {
    return this.execute(caller, { type: "refund", refunder, proof });
  }

  withdraw(caller: Address): LedgerEvent {
    return this.execute(caller, { type: "withdraw" });
  }

  /* ---------- views --------------------------------------------- */

  batchesOf(refunder: Address): BatchSet {
    return batchesOf(this.state, parseAddress(refunder));
  }

  balanceOf(refunder: Address): UInt256 {
    return balanceOf(this.state, parseAddress(refunder));
  }

  hasClaimed(refunder: Address, recipient: Address): boolean {
    return hasClaimed(this.state, parseAddress(refunder), parseAddress(recipient));
  }

  /** Batch a refund with this proof would pay from, balance aside. */
  previewRefund(
    refunder: Address,
    recipient: Address,
    proof: readonly Hash256[],
  ): ClaimableBatch | undefined {
    return findClaimableBatch(
      this.state,
      parseAddress(refunder),
      parseAddress(recipient),
      proof,
    );
  }

  stateRoot(): Hash256 {
    return computeStateRoot(this.state);
  }

  snapshot(): LedgerState {
    return this.state;
  }

  events(): readonly LedgerEvent[] {
    return [...this.journal];
  }

  /* ---------- internals ----------------------------------------- */

  private apply(caller: Address, cmd: Command): LedgerEvent {
    const before = this.state;
    const mark = this.pending.length;
    this.depth++;
    try {
      const outcome = applyCommand(before, caller, cmd);
      this.state = outcome.state;
      if (outcome.payout) this.pay(outcome.payout);
      this.pending.push(outcome.event);
      return outcome.event;
    } catch (err) {
      this.state = before;
      this.pending.length = mark;
      this.logFailure(caller, cmd.type, err);
      throw err;
    } finally {
      this.depth--;
    }
  }

  private pay({ to, amount }: Payout) {
    if (amount === 0n) return;
    try {
      this.channel.transfer(to, amount);
    } catch (cause) {
      throw new LedgerError(
        "TransferFailed",
        `transfer of ${amount} to ${to} rejected`,
        { to, amount },
        { cause },
      );
    }
  }

  /* the operation has committed by now; a failing sink is logged, not rethrown */
  private flush() {
    const committed = this.pending;
    this.pending = [];
    this.journal.push(...committed);
    if (!this.sink) return;
    for (const e of committed) {
      try {
        this.sink(e);
      } catch (err) {
        this.log.error({ event: e.type, refunder: e.refunder, err }, "event sink failed");
      }
    }
  }

  private logFailure(caller: Address, op: string, err: unknown) {
    if (isLedgerError(err, "TransferFailed")) {
      this.log.error({ op, caller, ...err.details, cause: err.cause }, err.message);
    } else if (isLedgerError(err)) {
      this.log.warn({ op, caller, code: err.code, ...err.details }, err.message);
    } else {
      this.log.error({ op, caller, err }, "operation aborted");
    }
  }
}
