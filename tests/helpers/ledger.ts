import { RefundLedger, type TransferChannel } from "../../src/core/ledger";
import { makeLogger } from "../../src/logging";
import type { LedgerEvent, LedgerState, Payout } from "../../src/core/types";

/* Records every transfer; `onTransfer` runs first and may throw to reject. */
export class RecordingChannel implements TransferChannel {
  readonly transfers: Payout[] = [];
  onTransfer?: (p: Payout) => void;

  transfer(to: Payout["to"], amount: bigint): void {
    this.onTransfer?.({ to, amount });
    this.transfers.push({ to, amount });
  }

  paidTo(to: Payout["to"]): bigint {
    return this.transfers
      .filter((t) => t.to === to)
      .reduce((sum, t) => sum + t.amount, 0n);
  }
}

export const mkLedger = (state?: LedgerState) => {
  const channel = new RecordingChannel();
  const delivered: LedgerEvent[] = [];
  const ledger = new RefundLedger({
    channel,
    sink: (e) => delivered.push(e),
    logger: makeLogger("silent"),
    state,
  });
  return { ledger, channel, delivered };
};
