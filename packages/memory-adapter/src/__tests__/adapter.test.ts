import type { Where } from "@fundflow/core/db";
import { describe, expect, it } from "vitest";
import { memoryAdapter } from "../adapter.js";

function deferred() {
	let release = () => {};
	const promise = new Promise<void>((resolve) => {
		release = resolve;
	});
	return { promise, release: () => release() };
}

const byId = (id: string): Where[] => [{ field: "id", operator: "eq", value: id }];

// =============================================================================
// MEMORY ADAPTER TESTS
// =============================================================================

describe("memoryAdapter", () => {
	it("identifies itself and supports row locks", () => {
		const adapter = memoryAdapter();
		expect(adapter.id).toBe("memory");
		expect(adapter.options).toEqual({ supportsForUpdate: true, dialectName: "memory" });
	});

	// =========================================================================
	// CRUD
	// =========================================================================

	describe("create", () => {
		it("generates an id when none is given", async () => {
			const adapter = memoryAdapter();
			const row = await adapter.create({ model: "accounts", data: { balance: 0 } });
			expect(typeof row.id).toBe("string");
			expect(await adapter.count({ model: "accounts" })).toBe(1);
		});

		it("returns a copy that does not alias the stored row", async () => {
			const adapter = memoryAdapter();
			const row = await adapter.create({ model: "accounts", data: { id: "a1", balance: 100 } });
			row.balance = 999;

			const stored = await adapter.findOne({ model: "accounts", where: byId("a1") });
			expect(stored?.balance).toBe(100);
		});

		it("keeps Date and nested object values intact", async () => {
			const adapter = memoryAdapter();
			const openedAt = new Date("2026-01-02T03:04:05.000Z");
			await adapter.create({
				model: "recovery_logs",
				data: { id: "r1", failedAt: openedAt, details: { senderAccount: "ACC1" } },
			});

			const stored = await adapter.findOne({ model: "recovery_logs", where: byId("r1") });
			expect(stored?.failedAt).toEqual(openedAt);
			expect(stored?.details).toEqual({ senderAccount: "ACC1" });
		});

		it("rejects a duplicate id with SQLSTATE 23505", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "accounts", data: { id: "a1" } });
			await expect(adapter.create({ model: "accounts", data: { id: "a1" } })).rejects.toMatchObject({
				code: "23505",
			});
		});

		it("enforces configured unique fields", async () => {
			const adapter = memoryAdapter({ uniqueFields: { accounts: ["accountNumber"] } });
			await adapter.create({ model: "accounts", data: { id: "a1", accountNumber: "ACC1" } });
			await expect(
				adapter.create({ model: "accounts", data: { id: "a2", accountNumber: "ACC1" } }),
			).rejects.toMatchObject({ code: "23505" });
			await adapter.create({ model: "accounts", data: { id: "a3", accountNumber: "ACC2" } });
			expect(await adapter.count({ model: "accounts" })).toBe(2);
		});
	});

	describe("findMany", () => {
		async function seeded() {
			const adapter = memoryAdapter();
			await adapter.create({ model: "tx", data: { id: "t1", amount: 10, createdAt: new Date(1000) } });
			await adapter.create({ model: "tx", data: { id: "t2", amount: 30, createdAt: new Date(3000) } });
			await adapter.create({ model: "tx", data: { id: "t3", amount: 20, createdAt: new Date(2000) } });
			return adapter;
		}

		it("sorts by numbers and dates in both directions", async () => {
			const adapter = await seeded();
			const byAmount = await adapter.findMany({
				model: "tx",
				sortBy: { field: "amount", direction: "asc" },
			});
			const byDate = await adapter.findMany({
				model: "tx",
				sortBy: { field: "createdAt", direction: "desc" },
			});
			expect(byAmount.map((r) => r.id)).toEqual(["t1", "t3", "t2"]);
			expect(byDate.map((r) => r.id)).toEqual(["t2", "t3", "t1"]);
		});

		it("applies offset before limit", async () => {
			const adapter = await seeded();
			const page = await adapter.findMany({
				model: "tx",
				sortBy: { field: "amount", direction: "asc" },
				offset: 1,
				limit: 1,
			});
			expect(page.map((r) => r.id)).toEqual(["t3"]);
		});

		it("returns an empty list for an unknown model", async () => {
			expect(await memoryAdapter().findMany({ model: "nothing" })).toEqual([]);
		});
	});

	describe("where operators", () => {
		async function seeded() {
			const adapter = memoryAdapter();
			await adapter.create({ model: "item", data: { id: "i1", amount: 10, code: "A1", note: null } });
			await adapter.create({ model: "item", data: { id: "i2", amount: 20, code: "a2", note: "x" } });
			await adapter.create({ model: "item", data: { id: "i3", amount: 30, code: "B1" } });
			return adapter;
		}

		it.each<[string, Where, string[]]>([
			["eq", { field: "amount", operator: "eq", value: 20 }, ["i2"]],
			["ne", { field: "amount", operator: "ne", value: 20 }, ["i1", "i3"]],
			["gt", { field: "amount", operator: "gt", value: 15 }, ["i2", "i3"]],
			["gte", { field: "amount", operator: "gte", value: 20 }, ["i2", "i3"]],
			["lt", { field: "amount", operator: "lt", value: 25 }, ["i1", "i2"]],
			["lte", { field: "amount", operator: "lte", value: 10 }, ["i1"]],
			["in", { field: "id", operator: "in", value: ["i1", "i3"] }, ["i1", "i3"]],
			["like (case insensitive)", { field: "code", operator: "like", value: "a_" }, ["i1", "i2"]],
			["is_null", { field: "note", operator: "is_null", value: null }, ["i1", "i3"]],
			["is_not_null", { field: "note", operator: "is_not_null", value: null }, ["i2"]],
		])("%s", async (_name, condition, expected) => {
			const adapter = await seeded();
			const rows = await adapter.findMany({ model: "item", where: [condition] });
			expect(rows.map((r) => r.id)).toEqual(expected);
		});

		it("never matches an ordering operator across types", async () => {
			const adapter = await seeded();
			const rows = await adapter.findMany({
				model: "item",
				where: [{ field: "amount", operator: "gt", value: "15" }],
			});
			expect(rows).toEqual([]);
		});
	});

	describe("update", () => {
		it("merges fields into the first match and keeps the id", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "accounts", data: { id: "a1", balance: 100, status: "ACTIVE" } });

			const updated = await adapter.update({
				model: "accounts",
				where: byId("a1"),
				update: { balance: 70, id: "other" },
			});

			expect(updated).toEqual({ id: "a1", balance: 70, status: "ACTIVE" });
		});

		it("returns null when nothing matches", async () => {
			const adapter = memoryAdapter();
			expect(await adapter.update({ model: "accounts", where: byId("nope"), update: { a: 1 } })).toBeNull();
		});
	});

	// =========================================================================
	// UNITS OF WORK
	// =========================================================================

	describe("transaction", () => {
		it("makes writes visible after commit", async () => {
			const adapter = memoryAdapter();
			const result = await adapter.transaction(async (tx) => {
				await tx.create({ model: "accounts", data: { id: "a1", balance: 5 } });
				const own = await tx.findOne({ model: "accounts", where: byId("a1") });
				return own?.balance;
			});

			expect(result).toBe(5);
			expect(await adapter.count({ model: "accounts" })).toBe(1);
		});

		it("discards every write when the unit throws", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "accounts", data: { id: "a1", balance: 100 } });

			await expect(
				adapter.transaction(async (tx) => {
					await tx.update({ model: "accounts", where: byId("a1"), update: { balance: 70 } });
					await tx.create({ model: "audit_logs", data: { id: "l1" } });
					throw new Error("abort");
				}),
			).rejects.toThrow("abort");

			expect((await adapter.findOne({ model: "accounts", where: byId("a1") }))?.balance).toBe(100);
			expect(await adapter.count({ model: "audit_logs" })).toBe(0);
		});

		it("hides uncommitted writes from other readers", async () => {
			const adapter = memoryAdapter();
			const gate = deferred();

			const writer = adapter.transaction(async (tx) => {
				await tx.create({ model: "accounts", data: { id: "a1" } });
				await gate.promise;
			});

			expect(await adapter.findOne({ model: "accounts", where: byId("a1") })).toBeNull();
			gate.release();
			await writer;
			expect(await adapter.findOne({ model: "accounts", where: byId("a1") })).not.toBeNull();
		});

		it("refuses calls on a finished unit", async () => {
			const adapter = memoryAdapter();
			const leaked = await adapter.transaction(async (tx) => tx);
			await expect(leaked.count({ model: "accounts" })).rejects.toThrow(
				"Unit of work has already finished",
			);
		});
	});

	// =========================================================================
	// ROW LOCKS
	// =========================================================================

	describe("row locks", () => {
		it("queues a second locker until the holder commits, then shows the committed row", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "accounts", data: { id: "a1", balance: 100 } });
			const gate = deferred();
			const order: string[] = [];

			const first = adapter.transaction(async (tx) => {
				await tx.findOne({ model: "accounts", where: byId("a1"), forUpdate: true });
				order.push("first locked");
				await gate.promise;
				await tx.update({ model: "accounts", where: byId("a1"), update: { balance: 40 } });
				order.push("first done");
			});
			const second = adapter.transaction(async (tx) => {
				const row = await tx.findOne({ model: "accounts", where: byId("a1"), forUpdate: true });
				order.push("second locked");
				return row?.balance;
			});

			await new Promise((resolve) => setTimeout(resolve, 10));
			expect(order).toEqual(["first locked"]);

			gate.release();
			await first;
			expect(await second).toBe(40);
			expect(order).toEqual(["first locked", "first done", "second locked"]);
		});

		it("lets a unit re-lock a row it already holds", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "accounts", data: { id: "a1", balance: 1 } });

			const balance = await adapter.transaction(async (tx) => {
				await tx.findOne({ model: "accounts", where: byId("a1"), forUpdate: true });
				await tx.update({ model: "accounts", where: byId("a1"), update: { balance: 2 } });
				const again = await tx.findOne({ model: "accounts", where: byId("a1"), forUpdate: true });
				return again?.balance;
			});

			expect(balance).toBe(2);
		});

		it("fails with SQLSTATE 55P03 once the lock timeout passes", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "accounts", data: { id: "a1" } });
			const gate = deferred();

			const holder = adapter.transaction(async (tx) => {
				await tx.findOne({ model: "accounts", where: byId("a1"), forUpdate: true });
				await gate.promise;
			});
			const waiter = adapter.transaction(
				(tx) => tx.findOne({ model: "accounts", where: byId("a1"), forUpdate: true }),
				{ lockTimeoutMs: 20 },
			);

			await expect(waiter).rejects.toMatchObject({
				code: "55P03",
				message: "canceling statement due to lock timeout",
			});
			gate.release();
			await holder;
		});

		it("fails with SQLSTATE 57014 when the statement timeout is shorter than the lock wait", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "accounts", data: { id: "a1" } });
			const gate = deferred();

			const holder = adapter.transaction(async (tx) => {
				await tx.findOne({ model: "accounts", where: byId("a1"), forUpdate: true });
				await gate.promise;
			});
			const waiter = adapter.transaction(
				(tx) => tx.update({ model: "accounts", where: byId("a1"), update: { balance: 1 } }),
				{ lockTimeoutMs: 1000, statementTimeoutMs: 20 },
			);

			await expect(waiter).rejects.toMatchObject({
				code: "57014",
				message: "canceling statement due to statement timeout",
			});
			gate.release();
			await holder;
		});

		it("keeps the lock timeout when it is the shorter bound", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "accounts", data: { id: "a1" } });
			const gate = deferred();

			const holder = adapter.transaction(async (tx) => {
				await tx.findOne({ model: "accounts", where: byId("a1"), forUpdate: true });
				await gate.promise;
			});
			const waiter = adapter.transaction(
				(tx) => tx.findOne({ model: "accounts", where: byId("a1"), forUpdate: true }),
				{ lockTimeoutMs: 20, statementTimeoutMs: 1000 },
			);

			await expect(waiter).rejects.toMatchObject({ code: "55P03" });
			gate.release();
			await holder;
		});

		it("fails at once with noWait", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "accounts", data: { id: "a1" } });
			const gate = deferred();

			const holder = adapter.transaction(async (tx) => {
				await tx.update({ model: "accounts", where: byId("a1"), update: { touched: true } });
				await gate.promise;
			});

			await expect(
				adapter.transaction((tx) =>
					tx.findOne({ model: "accounts", where: byId("a1"), forUpdate: true, noWait: true }),
				),
			).rejects.toMatchObject({ code: "55P03", message: "could not obtain lock on row accounts:a1" });

			gate.release();
			await holder;
		});

		it("re-checks the where clause after waiting, so a stale version matches nothing", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "accounts", data: { id: "a1", balance: 100, version: 1 } });
			const gate = deferred();

			const holder = adapter.transaction(async (tx) => {
				await tx.update({
					model: "accounts",
					where: byId("a1"),
					update: { balance: 40, version: 2 },
				});
				await gate.promise;
			});
			const contender = adapter.transaction((tx) =>
				tx.update({
					model: "accounts",
					where: [...byId("a1"), { field: "version", operator: "eq", value: 1 }],
					update: { balance: 0, version: 2 },
				}),
			);

			gate.release();
			await holder;
			expect(await contender).toBeNull();
			expect((await adapter.findOne({ model: "accounts", where: byId("a1") }))?.balance).toBe(40);
		});

		it("releases locks when a unit rolls back", async () => {
			const adapter = memoryAdapter();
			await adapter.create({ model: "accounts", data: { id: "a1", balance: 100 } });

			await expect(
				adapter.transaction(async (tx) => {
					await tx.findOne({ model: "accounts", where: byId("a1"), forUpdate: true });
					throw new Error("abort");
				}),
			).rejects.toThrow("abort");

			const row = await adapter.transaction(
				(tx) => tx.findOne({ model: "accounts", where: byId("a1"), forUpdate: true, noWait: true }),
				{ lockTimeoutMs: 10 },
			);
			expect(row?.balance).toBe(100);
		});
	});
});
