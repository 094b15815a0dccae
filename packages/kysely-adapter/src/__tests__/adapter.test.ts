import {
	type CompiledQuery,
	type DatabaseConnection,
	type Driver,
	Kysely,
	PostgresAdapter,
	PostgresIntrospector,
	PostgresQueryCompiler,
	type QueryResult,
	type TransactionSettings,
} from "kysely";
import { describe, expect, it } from "vitest";
import { buildKyselySql, kyselyAdapter } from "../adapter.js";

// =============================================================================
// RECORDING DRIVER - captures SQL instead of talking to PostgreSQL
// =============================================================================

interface Recorded {
	sql: string;
	parameters: readonly unknown[];
}

function createRecordingDb() {
	const log: Recorded[] = [];

	const connection: DatabaseConnection = {
		async executeQuery<R>(query: CompiledQuery): Promise<QueryResult<R>> {
			log.push({ sql: query.sql, parameters: query.parameters });
			return { rows: [] };
		},
		async *streamQuery<R>(): AsyncIterableIterator<QueryResult<R>> {},
	};

	const driver: Driver = {
		async init() {},
		async acquireConnection() {
			return connection;
		},
		async beginTransaction(_conn: DatabaseConnection, settings: TransactionSettings) {
			log.push({ sql: `begin ${settings.isolationLevel ?? "default"}`, parameters: [] });
		},
		async commitTransaction() {
			log.push({ sql: "commit", parameters: [] });
		},
		async rollbackTransaction() {
			log.push({ sql: "rollback", parameters: [] });
		},
		async releaseConnection() {},
		async destroy() {},
	};

	const db = new Kysely<Record<string, never>>({
		dialect: {
			createAdapter: () => new PostgresAdapter(),
			createDriver: () => driver,
			createIntrospector: (kysely) => new PostgresIntrospector(kysely),
			createQueryCompiler: () => new PostgresQueryCompiler(),
		},
	});

	return { db, log };
}

describe("buildKyselySql", () => {
	it("binds $N placeholders as parameters in order", () => {
		const { db } = createRecordingDb();
		const compiled = buildKyselySql(
			'SELECT * FROM "accounts" WHERE "id" = $1 AND "status" = $2',
			["a1", "ACTIVE"],
		).compile(db);

		expect(compiled.sql).toBe('SELECT * FROM "accounts" WHERE "id" = $1 AND "status" = $2');
		expect(compiled.parameters).toEqual(["a1", "ACTIVE"]);
	});

	it("passes a query without placeholders through", () => {
		const { db } = createRecordingDb();
		const compiled = buildKyselySql("SELECT 1", []).compile(db);
		expect(compiled.sql).toBe("SELECT 1");
		expect(compiled.parameters).toEqual([]);
	});
});

describe("kyselyAdapter", () => {
	it("locks with FOR UPDATE and FOR UPDATE NOWAIT", async () => {
		const { db, log } = createRecordingDb();
		const adapter = kyselyAdapter(db);
		const where = [{ field: "id", operator: "eq" as const, value: "a1" }];

		expect(await adapter.findOne({ model: "accounts", where, forUpdate: true })).toBeNull();
		await adapter.findOne({ model: "accounts", where, forUpdate: true, noWait: true });

		expect(log.map((q) => q.sql)).toEqual([
			'SELECT * FROM "accounts" WHERE "id" = $1 LIMIT 1 FOR UPDATE',
			'SELECT * FROM "accounts" WHERE "id" = $1 LIMIT 1 FOR UPDATE NOWAIT',
		]);
	});

	it("qualifies tables with the configured schema", async () => {
		const { db, log } = createRecordingDb();
		const adapter = kyselyAdapter(db, { schema: "banking" });

		await adapter.findMany({
			model: "audit_logs",
			where: [{ field: "accountId", operator: "eq", value: "a1" }],
			sortBy: { field: "changedAt", direction: "asc" },
			limit: 10,
			offset: 20,
		});

		expect(log[0]).toEqual({
			sql: 'SELECT * FROM "banking"."audit_logs" WHERE "account_id" = $1 ORDER BY "changed_at" ASC LIMIT $2 OFFSET $3',
			parameters: ["a1", 10, 20],
		});
	});

	it("follows a schema set on its options after construction", async () => {
		const { db, log } = createRecordingDb();
		const adapter = kyselyAdapter(db);
		expect(adapter.options?.schema).toBe("public");
		if (adapter.options) adapter.options.schema = "banking";

		await adapter.count({ model: "accounts" });
		await adapter.transaction((tx) => tx.count({ model: "transactions" }));

		expect(log.map((q) => q.sql)).toEqual([
			'SELECT COUNT(*)::int AS count FROM "banking"."accounts" WHERE TRUE',
			"begin read committed",
			'SELECT COUNT(*)::int AS count FROM "banking"."transactions" WHERE TRUE',
			"commit",
		]);
	});

	it("numbers WHERE parameters after the SET values on update", async () => {
		const { db, log } = createRecordingDb();
		const adapter = kyselyAdapter(db);

		const result = await adapter.update({
			model: "accounts",
			where: [
				{ field: "id", operator: "eq", value: "a1" },
				{ field: "version", operator: "eq", value: 3 },
			],
			update: { balance: 7000, version: 4 },
		});

		expect(result).toBeNull();
		expect(log[0]).toEqual({
			sql: 'UPDATE "accounts" SET "balance" = $1, "version" = $2 WHERE "id" = $3 AND "version" = $4 RETURNING *',
			parameters: [7000, 4, "a1", 3],
		});
	});

	it("reports a failed insert that returned nothing", async () => {
		const { db, log } = createRecordingDb();
		const adapter = kyselyAdapter(db);

		await expect(
			adapter.create({ model: "accounts", data: { id: "a1", accountNumber: "ACC1" } }),
		).rejects.toThrow("Insert into accounts returned no rows");
		expect(log[0]).toEqual({
			sql: 'INSERT INTO "accounts" ("id", "account_number") VALUES ($1, $2) RETURNING *',
			parameters: ["a1", "ACC1"],
		});
	});

	it("counts with an integer cast", async () => {
		const { db, log } = createRecordingDb();
		expect(await kyselyAdapter(db).count({ model: "transactions" })).toBe(0);
		expect(log[0]?.sql).toBe('SELECT COUNT(*)::int AS count FROM "transactions" WHERE TRUE');
	});

	it("runs units of work at read committed with local timeouts", async () => {
		const { db, log } = createRecordingDb();
		const adapter = kyselyAdapter(db);

		const result = await adapter.transaction(
			async (tx) => {
				expect(tx.id).toBe("kysely");
				return tx.count({ model: "accounts" });
			},
			{ lockTimeoutMs: 250, statementTimeoutMs: 5000 },
		);

		expect(result).toBe(0);
		expect(log).toEqual([
			{ sql: "begin read committed", parameters: [] },
			{ sql: "SELECT set_config('lock_timeout', $1, true)", parameters: ["250ms"] },
			{ sql: "SELECT set_config('statement_timeout', $1, true)", parameters: ["5000ms"] },
			{ sql: 'SELECT COUNT(*)::int AS count FROM "accounts" WHERE TRUE', parameters: [] },
			{ sql: "commit", parameters: [] },
		]);
	});

	it("rolls back when the unit throws", async () => {
		const { db, log } = createRecordingDb();
		const adapter = kyselyAdapter(db);

		await expect(
			adapter.transaction(async () => {
				throw new Error("insufficient");
			}),
		).rejects.toThrow("insufficient");

		expect(log.map((q) => q.sql)).toEqual(["begin read committed", "rollback"]);
	});
});
