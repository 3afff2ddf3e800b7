import { expect } from "chai";
import { SettlementError, SettlementErrorKind, isSettlementError } from "../src/errors";
import { Logger } from "../src/types";

export const silent: Logger = { log: () => undefined, warn: () => undefined };

export async function expectSettlementError(
  pending: Promise<unknown>,
  kind: SettlementErrorKind,
): Promise<SettlementError> {
  try {
    await pending;
  } catch (e) {
    if (isSettlementError(e)) {
      expect(e.kind).to.equal(kind);
      return e;
    }
    throw e;
  }
  expect.fail(`expected ${kind}`);
}

export async function expectRevert(pending: Promise<unknown>, message: string): Promise<void> {
  try {
    await pending;
  } catch (e) {
    if (!(e instanceof Error)) throw e;
    expect(e.message).to.equal(message);
    return;
  }
  expect.fail(`expected revert "${message}"`);
}
