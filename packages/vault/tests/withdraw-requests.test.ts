/**
 * Tests for the withdrawal request lifecycle.
 */

import { describe, it, expect, beforeEach } from "vitest";
import fc from "fast-check";
import type { WithdrawStatus } from "@tidepool/types";
import { VAULT_EVENTS, walletStream } from "@tidepool/event-store";
import { VaultError } from "../src/types.js";
import type { WithdrawRequestUpdate } from "../src/types.js";
import type { Harness } from "./fixtures.js";
import {
  ALICE,
  BACKEND,
  BOB,
  USDC,
  W_ALICE,
  W_BOB,
  codeOf,
  createFundedHarness,
} from "./fixtures.js";

function pending(addAvailable: bigint): WithdrawRequestUpdate {
  return { status: "pending", addAvailable, errorMessage: "" };
}

describe("withdraw requests", () => {
  let h: Harness;

  beforeEach(() => {
    h = createFundedHarness();
    h.vault.deposit(ALICE, W_ALICE, USDC, 1000n);
  });

  describe("requestWithdraw", () => {
    it("opens a pending request with sequential ids", () => {
      const first = h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 100n);
      const second = h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 50n);

      expect(first).toMatchObject({
        requestId: 1,
        walletId: W_ALICE,
        assetId: USDC,
        requestedAmount: 100n,
        availableAmount: 0n,
        settledAmount: 0n,
        status: "pending",
        errorMessage: "",
        version: 1,
      });
      expect(second.requestId).toBe(2);
      expect(h.vault.getWallet(W_ALICE)?.nextRequestId).toBe(3);
    });

    it("does not move funds when a request is opened", () => {
      h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 100n);

      expect(h.vault.getAsset(USDC)?.totalAmount).toBe(1000n);
      expect(h.custody.balanceOf(USDC, ALICE)).toBe(9000n);
    });

    it("limits open requests to the position's principal", () => {
      expect(codeOf(() => h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 1001n))).toBe(
        "INSUFFICIENT_FUND",
      );
      h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 600n);
      expect(codeOf(() => h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 500n))).toBe(
        "INSUFFICIENT_FUND",
      );
    });

    it("rejects a wallet without a position", () => {
      expect(codeOf(() => h.vault.requestWithdraw(BOB, W_BOB, USDC, 1n))).toBe("INSUFFICIENT_FUND");
    });

    it("measures requests against principal, not accrued yield", () => {
      h.custody.credit(USDC, BACKEND, 100n);
      h.vault.injectYield(BACKEND, USDC, 100n);

      expect(codeOf(() => h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 1050n))).toBe(
        "INSUFFICIENT_FUND",
      );
      expect(h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 1000n).requestedAmount).toBe(1000n);
      // the instant path still pays out the yield
      expect(h.vault.withdraw(ALICE, W_ALICE, USDC, 100n).amount).toBe(100n);
    });
  });

  describe("partial sourcing and settlement", () => {
    it("pays out what has been sourced so far", () => {
      h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 100n);
      const sourced = h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, pending(40n));
      expect(sourced.availableAmount).toBe(40n);
      expect(sourced.version).toBe(2);
      expect(h.vault.getAsset(USDC)?.totalReservedAmount).toBe(40n);

      const result = h.vault.withdrawRequestedAmount(ALICE, W_ALICE, USDC);

      expect(result.amount).toBe(40n);
      expect(result.sharesBurned).toBe(40n);
      expect(result.requestIds).toEqual([1]);
      expect(h.vault.getWithdrawalState(W_ALICE, USDC)).toMatchObject({
        requestedAmount: 100n,
        availableAmount: 0n,
        settledAmount: 40n,
        isSettled: false,
      });
      expect(h.vault.getAsset(USDC)?.totalAmount).toBe(960n);
      expect(h.vault.getAsset(USDC)?.totalReservedAmount).toBe(0n);
      expect(h.custody.balanceOf(USDC, ALICE)).toBe(9040n);
    });

    it("completes a request once the full amount is sourced and settled", () => {
      h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 100n);
      h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, pending(40n));
      h.vault.withdrawRequestedAmount(ALICE, W_ALICE, USDC);

      const done = h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, {
        status: "success",
        addAvailable: 60n,
        errorMessage: "",
      });
      expect(done.status).toBe("success");
      expect(done.availableAmount).toBe(60n);

      const result = h.vault.withdrawRequestedAmount(ALICE, W_ALICE, USDC);
      expect(result.amount).toBe(60n);

      const request = h.vault.getWithdrawRequest(W_ALICE, 1);
      expect(request.settledAmount).toBe(100n);
      expect(request.availableAmount).toBe(0n);
      expect(request.version).toBe(5);
      expect(h.vault.getWithdrawalState(W_ALICE, USDC)).toMatchObject({
        requestedAmount: 0n,
        isSettled: true,
      });
      expect(h.custody.balanceOf(USDC, ALICE)).toBe(9100n);
    });

    it("settles several requests at once", () => {
      h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 100n);
      h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 200n);
      h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, pending(30n));
      h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 2, pending(70n));

      const result = h.vault.withdrawRequestedAmount(ALICE, W_ALICE, USDC);

      expect(result.amount).toBe(100n);
      expect(result.requestIds).toEqual([1, 2]);
    });

    it("fails when nothing has been sourced", () => {
      h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 100n);
      expect(codeOf(() => h.vault.withdrawRequestedAmount(ALICE, W_ALICE, USDC))).toBe(
        "NO_AVAILABLE_AMOUNT",
      );
    });

    it("only lets the owner settle", () => {
      h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 100n);
      h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, pending(40n));
      expect(codeOf(() => h.vault.withdrawRequestedAmount(BOB, W_ALICE, USDC))).toBe(
        "NOT_AUTHORIZED",
      );
    });
  });

  describe("failure", () => {
    beforeEach(() => {
      h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 200n);
      h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, pending(50n));
    });

    it("releases the reservation and keeps a trimmed reason", () => {
      const failed = h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, {
        status: "failed",
        addAvailable: 0n,
        errorMessage: "  bridge unavailable ",
      });

      expect(failed.status).toBe("failed");
      expect(failed.availableAmount).toBe(0n);
      expect(failed.errorMessage).toBe("bridge unavailable");
      expect(h.vault.getAsset(USDC)?.totalReservedAmount).toBe(0n);
    });

    it("is terminal", () => {
      h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, {
        status: "failed",
        addAvailable: 0n,
        errorMessage: "bridge unavailable",
      });

      expect(
        codeOf(() => h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, pending(10n))),
      ).toBe("INVALID_STATE_TRANSITION");
    });

    it("frees the claimed funds for instant withdrawal", () => {
      h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, {
        status: "failed",
        addAvailable: 0n,
        errorMessage: "bridge unavailable",
      });

      expect(h.vault.withdraw(ALICE, W_ALICE, USDC, 1000n).amount).toBe(1000n);
    });
  });

  describe("success", () => {
    beforeEach(() => {
      h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 100n);
      h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, {
        status: "success",
        addAvailable: 100n,
        errorMessage: "",
      });
    });

    it("is terminal", () => {
      const failed = { status: "failed" as const, addAvailable: 0n, errorMessage: "too late" };
      const done = { status: "success" as const, addAvailable: 0n, errorMessage: "" };

      expect(codeOf(() => h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, failed))).toBe(
        "INVALID_STATE_TRANSITION",
      );
      expect(codeOf(() => h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, done))).toBe(
        "INVALID_STATE_TRANSITION",
      );
      expect(
        codeOf(() => h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, pending(1n))),
      ).toBe("INVALID_STATE_TRANSITION");
      expect(h.vault.getWithdrawRequest(W_ALICE, 1)).toMatchObject({
        status: "success",
        availableAmount: 100n,
        version: 2,
      });
    });

    it("stays successful once settled", () => {
      h.vault.withdrawRequestedAmount(ALICE, W_ALICE, USDC);

      expect(h.vault.getWithdrawRequest(W_ALICE, 1)).toMatchObject({
        status: "success",
        availableAmount: 0n,
        settledAmount: 100n,
      });
      expect(
        codeOf(() =>
          h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, {
            status: "failed",
            addAvailable: 0n,
            errorMessage: "too late",
          }),
        ),
      ).toBe("INVALID_STATE_TRANSITION");
    });
  });

  describe("update validation", () => {
    beforeEach(() => {
      h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 100n);
    });

    const update = (u: WithdrawRequestUpdate, requestId = 1): string | undefined =>
      codeOf(() => h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, requestId, u));

    it("rejects malformed status updates", () => {
      expect(update(pending(0n))).toBe("INVALID_STATUS_UPDATE");
      expect(update({ status: "pending", addAvailable: 10n, errorMessage: "oops" })).toBe(
        "INVALID_STATUS_UPDATE",
      );
      expect(update({ status: "success", addAvailable: 50n, errorMessage: "" })).toBe(
        "INVALID_STATUS_UPDATE",
      );
      expect(update({ status: "failed", addAvailable: 0n, errorMessage: "   " })).toBe(
        "INVALID_STATUS_UPDATE",
      );
      expect(update({ status: "failed", addAvailable: 10n, errorMessage: "oops" })).toBe(
        "INVALID_STATUS_UPDATE",
      );
    });

    it("rejects amounts outside the request", () => {
      expect(update(pending(-1n))).toBe("INVALID_AMOUNT");
      expect(update(pending(101n))).toBe("INVALID_AMOUNT");
    });

    it("checks the expected version", () => {
      expect(update({ ...pending(10n), expectedVersion: 2 })).toBe("CONCURRENT_MODIFICATION");
      expect(update({ ...pending(10n), expectedVersion: 1 })).toBeUndefined();
    });

    it("reports unknown requests", () => {
      expect(update(pending(10n), 9)).toBe("REQUEST_NOT_FOUND");
      expect(codeOf(() => h.vault.getWithdrawRequest(W_ALICE, 9))).toBe("REQUEST_NOT_FOUND");
    });

    it("requires the backend capability", () => {
      expect(codeOf(() => h.vault.updateWithdrawRequestStatus(ALICE, W_ALICE, 1, pending(10n)))).toBe(
        "NOT_AUTHORIZED",
      );
    });

    it("cannot reserve liquidity deployed to a strategy", async () => {
      await h.vault.depositToStrategy(BACKEND, W_ALICE, USDC, "lending", 950n);

      expect(update(pending(60n))).toBe("INSUFFICIENT_LIQUIDITY");
      expect(update(pending(50n))).toBeUndefined();
    });
  });

  describe("queries", () => {
    it("lists requests by status", () => {
      h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 100n);
      h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 200n);
      h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 2, {
        status: "failed",
        addAvailable: 0n,
        errorMessage: "rejected",
      });

      expect(h.vault.listWithdrawRequests(W_ALICE).map((r) => r.requestId)).toEqual([1, 2]);
      expect(
        h.vault.listWithdrawRequests(W_ALICE, { status: "failed" }).map((r) => r.requestId),
      ).toEqual([2]);
      expect(h.vault.getWithdrawalState(W_ALICE, USDC).requestedAmount).toBe(100n);
    });

    it("reports an empty state for a wallet without requests", () => {
      expect(h.vault.getWithdrawalState(W_BOB, USDC)).toEqual({
        requestedAmount: 0n,
        availableAmount: 0n,
        settledAmount: 0n,
        isSettled: true,
        requests: [],
      });
    });
  });

  describe("records", () => {
    it("records creation and updates on the wallet stream", () => {
      h.vault.requestWithdraw(ALICE, W_ALICE, USDC, 100n);
      h.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, pending(40n));

      const events = h.records.read(walletStream(W_ALICE)).slice(-2);
      expect(events[0]?.event.type).toBe(VAULT_EVENTS.WITHDRAW_REQUEST_CREATED);
      expect(events[0]?.event.payload).toEqual({
        walletId: W_ALICE,
        assetId: USDC,
        requestId: 1,
        requestedAmount: "100",
      });
      expect(events[1]?.event.type).toBe(VAULT_EVENTS.WITHDRAW_REQUEST_UPDATED);
      expect(events[1]?.event.payload).toEqual({
        walletId: W_ALICE,
        assetId: USDC,
        requestId: 1,
        status: "pending",
        addAvailable: "40",
        availableAmount: "40",
        settledAmount: "0",
        errorMessage: "",
        version: 2,
      });
      expect(events[1]?.event.metadata.actor).toBe(BACKEND);
    });
  });

  describe("properties", () => {
    it("never sources more than requested and keeps reservations in step", () => {
      const arbStep = fc.oneof(
        fc.record({ kind: fc.constant("add" as const), amount: fc.bigInt({ min: 1n, max: 80n }) }),
        fc.record({ kind: fc.constant("settle" as const), amount: fc.constant(0n) }),
      );

      fc.assert(
        fc.property(fc.array(arbStep, { maxLength: 20 }), (steps) => {
          const run = createFundedHarness();
          run.vault.deposit(ALICE, W_ALICE, USDC, 1000n);
          run.vault.requestWithdraw(ALICE, W_ALICE, USDC, 200n);

          for (const step of steps) {
            try {
              if (step.kind === "add") {
                run.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, pending(step.amount));
              } else {
                run.vault.withdrawRequestedAmount(ALICE, W_ALICE, USDC);
              }
            } catch (err) {
              if (!(err instanceof VaultError)) throw err;
            }

            const request = run.vault.getWithdrawRequest(W_ALICE, 1);
            expect(request.availableAmount + request.settledAmount).toBeLessThanOrEqual(200n);
            expect(run.vault.getAsset(USDC)?.totalReservedAmount).toBe(request.availableAmount);
          }
        }),
        { numRuns: 50 },
      );
    });

    it("never moves a request out of success or failed", () => {
      const arbStep = fc.tuple(
        fc.constantFrom("add", "settle", "complete", "fail"),
        fc.bigInt({ min: 1n, max: 80n }),
      );

      fc.assert(
        fc.property(fc.array(arbStep, { maxLength: 20 }), (steps) => {
          const run = createFundedHarness();
          run.vault.deposit(ALICE, W_ALICE, USDC, 1000n);
          run.vault.requestWithdraw(ALICE, W_ALICE, USDC, 200n);
          let terminal: WithdrawStatus | undefined;

          for (const [kind, amount] of steps) {
            const before = run.vault.getWithdrawRequest(W_ALICE, 1);
            const apply = (): unknown => {
              switch (kind) {
                case "add":
                  return run.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, pending(amount));
                case "complete":
                  return run.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, {
                    status: "success",
                    addAvailable: 200n - before.availableAmount - before.settledAmount,
                    errorMessage: "",
                  });
                case "fail":
                  return run.vault.updateWithdrawRequestStatus(BACKEND, W_ALICE, 1, {
                    status: "failed",
                    addAvailable: 0n,
                    errorMessage: "venue down",
                  });
                case "settle":
                  return run.vault.withdrawRequestedAmount(ALICE, W_ALICE, USDC);
              }
            };

            const code = codeOf(apply);
            const after = run.vault.getWithdrawRequest(W_ALICE, 1);

            if (terminal !== undefined) {
              expect(after.status).toBe(terminal);
              if (kind !== "settle") expect(code).toBe("INVALID_STATE_TRANSITION");
            }
            if (after.status !== "pending") terminal = after.status;
          }
        }),
        { numRuns: 50 },
      );
    });
  });
});
