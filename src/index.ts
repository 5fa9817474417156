export * from "./core/types";
export * from "./core/errors";
export { hashPair, isAddress, isHash256, leafOf, processProof, verify } from "./core/merkle";
export {
  applyCommand,
  balanceOf,
  batchesOf,
  claimKey,
  findClaimableBatch,
  hasClaimed,
} from "./core/reducer";
export { RefundLedger } from "./core/ledger";
export type { EventSink, LedgerOptions, TransferChannel } from "./core/ledger";
export { checkState, computeStateRoot, decodeState, encodeState } from "./core/stateEncoder";
export {
  decodeCommand,
  decodeEvent,
  decodeInput,
  encodeCommand,
  encodeEvent,
  encodeInput,
} from "./codec/rlp";
export { commandSchema, parseAddress, parseCommand } from "./model/validation";
export { loadConfig, type Config } from "./config";
export { makeLogger, type ILogger } from "./logging";
