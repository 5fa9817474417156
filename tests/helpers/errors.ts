import { isLedgerError, type LedgerErrorCode } from "../../src/core/errors";

/* code of the LedgerError thrown by `fn`, undefined when it returns */
export const errorCode = (fn: () => unknown): LedgerErrorCode | undefined => {
  try {
    fn();
  } catch (err) {
    if (isLedgerError(err)) return err.code;
    throw err;
  }
  return undefined;
};
