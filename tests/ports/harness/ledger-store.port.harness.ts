// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/ports/harness/ledger-store.port`
 * Purpose: Shared contract tests for RecyclingLedgerStore ensuring consistent behavior across adapters.
 * Scope: Tests store invariants (atomic transactions, counters, ordering, amount round-trips). Does not test lifecycle rules or services.
 * Invariants: Every adapter passes the same suite; a fresh store per test.
 * Side-effects: IO (whatever the adapter under test does)
 * Notes: Called from adapter specs; tests invariants not implementation details.
 * Links: RecyclingLedgerStore port, in-memory-ledger-store.spec.ts, sqlite-ledger-store.spec.ts
 * @internal
 */

import { toParticipantId } from "@reclaim/ids";
import {
  AMOUNT_MAX,
  type IncentiveProgram,
  type TransferRecord,
  type WasteCategory,
  type WasteUnit,
} from "@reclaim/waste-core";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import type { RecyclingLedgerStore } from "@/ports";

import { dispose, makeHarness, type TestHarness } from "./factory";

const alice = toParticipantId("alice");
const bob = toParticipantId("bob");
const carol = toParticipantId("carol");
const T0 = new Date("2025-03-01T10:00:00.123Z");

function waste(id: number, overrides: Partial<WasteUnit> = {}): WasteUnit {
  return {
    id,
    category: "PLASTIC",
    weight: 2500n,
    submitter: alice,
    currentOwner: alice,
    status: "PENDING",
    isConfirmed: false,
    confirmer: alice,
    isActive: true,
    location: { latitude: -33_868_820, longitude: 151_209_296 },
    createdAt: T0,
    ...overrides,
  };
}

function program(
  id: number,
  overrides: Partial<IncentiveProgram> = {}
): IncentiveProgram {
  return {
    id,
    issuer: carol,
    category: "PLASTIC",
    rewardRate: 100n,
    totalBudget: 10_000n,
    remainingBudget: 10_000n,
    active: true,
    createdAt: T0,
    ...overrides,
  };
}

function counts(
  overrides: Partial<Record<WasteCategory, number>> = {}
): Record<WasteCategory, number> {
  return { PAPER: 0, PET_PLASTIC: 0, PLASTIC: 0, METAL: 0, GLASS: 0, ...overrides };
}

function hop(id: number, wasteId: number): TransferRecord {
  return { id, wasteId, from: alice, to: bob, timestamp: T0, note: `hop ${id}` };
}

/**
 * Register RecyclingLedgerStore port contract tests.
 * Adapter specs call this with a factory that builds an empty store and
 * registers its teardown on the harness.
 */
export function registerLedgerStoreContract(
  makeStore: (h: TestHarness) => RecyclingLedgerStore
): void {
  describe("RecyclingLedgerStore Port Contract", () => {
    let h: TestHarness;
    let store: RecyclingLedgerStore;

    beforeEach(() => {
      h = makeHarness();
      store = makeStore(h);
    });

    afterEach(() => {
      dispose(h);
    });

    describe("id allocation", () => {
      it("starts each space at 1 and counts spaces independently", () => {
        expect(store.peekCounter("waste")).toBe(0);
        expect(store.allocateId("waste")).toBe(1);
        expect(store.allocateId("waste")).toBe(2);
        expect(store.allocateId("incentive")).toBe(1);
        expect(store.peekCounter("waste")).toBe(2);
        expect(store.peekCounter("transfer")).toBe(0);
      });
    });

    describe("waste units", () => {
      it("round-trips every field, including AMOUNT_MAX weights and negative coordinates", () => {
        const unit = waste(1, { weight: AMOUNT_MAX });
        store.insertWaste(unit);

        expect(store.getWaste(1)).toEqual(unit);
        expect(store.getWaste(2)).toBeNull();
      });

      it("saveWaste replaces the stored record", () => {
        store.insertWaste(waste(1));
        store.saveWaste(
          waste(1, { currentOwner: bob, status: "PROCESSING", isActive: false })
        );

        const stored = store.getWaste(1);
        expect(stored?.currentOwner).toBe(bob);
        expect(stored?.status).toBe("PROCESSING");
        expect(stored?.isActive).toBe(false);
      });

      it("counts every unit but sums only active weight", () => {
        store.insertWaste(waste(1, { weight: 1000n }));
        store.insertWaste(waste(2, { weight: 4000n, isActive: false }));
        store.insertWaste(waste(3, { weight: 500n }));

        expect(store.countWastes()).toBe(3);
        expect(store.sumActiveWasteWeight()).toBe(1500n);
      });

      it("getters return fresh objects", () => {
        store.insertWaste(waste(1));
        const first = store.getWaste(1);
        const second = store.getWaste(1);
        expect(first).not.toBe(second);
        expect(first).toEqual(second);
      });
    });

    describe("holdings", () => {
      it("lists ids in acquisition order and drops removed ids", () => {
        store.addHolding(alice, 3);
        store.addHolding(alice, 1);
        store.addHolding(alice, 2);
        store.addHolding(bob, 4);
        store.removeHolding(alice, 1);

        expect(store.listHoldings(alice)).toEqual([3, 2]);
        expect(store.listHoldings(bob)).toEqual([4]);
        expect(store.listHoldings(carol)).toEqual([]);
      });
    });

    describe("associations", () => {
      it("keeps first-association order, ignores repeats and survives holding removal", () => {
        store.recordAssociation(alice, 2);
        store.recordAssociation(alice, 1);
        store.recordAssociation(alice, 2);
        store.addHolding(alice, 2);
        store.removeHolding(alice, 2);

        expect(store.listAssociations(alice)).toEqual([2, 1]);
        expect(store.listAssociations(bob)).toEqual([]);
      });

      it("rolls back with the enclosing transaction", () => {
        expect(() =>
          store.transaction(() => {
            store.recordAssociation(alice, 1);
            throw new Error("boom");
          })
        ).toThrow("boom");

        expect(store.listAssociations(alice)).toEqual([]);
      });
    });

    describe("transfers", () => {
      it("returns each unit's history in append order", () => {
        store.appendTransfer(hop(1, 7));
        store.appendTransfer(hop(2, 8));
        store.appendTransfer(hop(3, 7));

        expect(store.listTransfers(7)).toEqual([hop(1, 7), hop(3, 7)]);
        expect(store.listTransfers(8)).toEqual([hop(2, 8)]);
        expect(store.listTransfers(99)).toEqual([]);
      });
    });

    describe("incentive programs", () => {
      it("round-trips and indexes by issuer and category in id order", () => {
        store.insertIncentive(program(1));
        store.insertIncentive(program(2, { issuer: bob }));
        store.insertIncentive(program(3, { category: "GLASS" }));

        expect(store.getIncentive(1)).toEqual(program(1));
        expect(store.getIncentive(4)).toBeNull();
        expect(store.listIncentiveIdsByIssuer(carol)).toEqual([1, 3]);
        expect(store.listIncentiveIdsByCategory("PLASTIC")).toEqual([1, 2]);
        expect(store.listIncentiveIdsByCategory("PAPER")).toEqual([]);
      });

      it("saveIncentive persists budget and activation changes", () => {
        store.insertIncentive(program(1));
        store.saveIncentive(
          program(1, { remainingBudget: 0n, active: false })
        );

        expect(store.getIncentive(1)).toMatchObject({
          remainingBudget: 0n,
          active: false,
        });
      });
    });

    describe("participants and statistics", () => {
      it("saveParticipant inserts then overwrites", () => {
        const record = {
          id: alice,
          role: "RECYCLER" as const,
          name: "Alice",
          location: { latitude: 1, longitude: -1 },
          isRegistered: true,
          registeredAt: T0,
        };
        store.saveParticipant(record);
        store.saveParticipant({ ...record, role: "COLLECTOR" });

        expect(store.getParticipant(alice)).toEqual({
          ...record,
          role: "COLLECTOR",
        });
        expect(store.getParticipant(bob)).toBeNull();
      });

      it("stores stats per participant and sums lifetime earnings", () => {
        expect(store.getParticipantStats(alice)).toBeNull();
        store.saveParticipantStats({
          participant: alice,
          totalEarned: 250n,
          submissions: 2,
          totalSubmittedWeight: 7000n,
          submissionsByCategory: counts({ PAPER: 1, GLASS: 1 }),
        });
        store.saveParticipantStats({
          participant: bob,
          totalEarned: 25n,
          submissions: 0,
          totalSubmittedWeight: 0n,
          submissionsByCategory: counts(),
        });
        store.saveParticipantStats({
          participant: alice,
          totalEarned: 300n,
          submissions: 3,
          totalSubmittedWeight: 8000n,
          submissionsByCategory: counts({ PAPER: 1, GLASS: 1, METAL: 1 }),
        });

        expect(store.getParticipantStats(alice)).toEqual({
          participant: alice,
          totalEarned: 300n,
          submissions: 3,
          totalSubmittedWeight: 8000n,
          submissionsByCategory: counts({ PAPER: 1, GLASS: 1, METAL: 1 }),
        });
        expect(store.sumTotalEarned()).toBe(325n);
      });
    });

    describe("settings", () => {
      it("is empty until saved, then holds the latest value", () => {
        expect(store.getSettings()).toBeNull();
        store.saveSettings({ admin: alice, collectorPercent: 5, ownerPercent: 50 });
        store.saveSettings({ admin: bob, collectorPercent: 10, ownerPercent: 40 });

        expect(store.getSettings()).toEqual({
          admin: bob,
          collectorPercent: 10,
          ownerPercent: 40,
        });
      });
    });

    describe("token transfers", () => {
      it("lists movements received by one participant in append order", () => {
        store.appendTokenTransfer({ from: carol, to: alice, amount: 250n, createdAt: T0 });
        store.appendTokenTransfer({ from: carol, to: bob, amount: 25n, createdAt: T0 });
        store.appendTokenTransfer({ from: carol, to: alice, amount: 225n, createdAt: T0 });

        expect(
          store.listTokenTransfersTo(alice).map((t) => t.amount)
        ).toEqual([250n, 225n]);
        expect(store.listTokenTransfersTo(bob)).toEqual([
          { from: carol, to: bob, amount: 25n, createdAt: T0 },
        ]);
      });
    });

    describe("transactions", () => {
      it("returns the work's value and keeps its writes", () => {
        const id = store.transaction(() => {
          const next = store.allocateId("waste");
          store.insertWaste(waste(next));
          return next;
        });

        expect(id).toBe(1);
        expect(store.getWaste(1)).not.toBeNull();
      });

      it("discards every write, counters included, when the work throws", () => {
        store.insertIncentive(program(1));

        expect(() =>
          store.transaction(() => {
            store.insertWaste(waste(store.allocateId("waste")));
            store.addHolding(alice, 1);
            store.saveIncentive(program(1, { remainingBudget: 1n }));
            throw new Error("boom");
          })
        ).toThrow("boom");

        expect(store.peekCounter("waste")).toBe(0);
        expect(store.getWaste(1)).toBeNull();
        expect(store.listHoldings(alice)).toEqual([]);
        expect(store.getIncentive(1)?.remainingBudget).toBe(10_000n);
      });

      it("a failed nested transaction leaves the outer work in place", () => {
        store.transaction(() => {
          store.addHolding(alice, 1);
          expect(() =>
            store.transaction(() => {
              store.addHolding(alice, 2);
              throw new Error("inner");
            })
          ).toThrow("inner");
        });

        expect(store.listHoldings(alice)).toEqual([1]);
      });
    });
  });
}
