// =============================================================================
// ROW MAPPERS
// =============================================================================
// Adapters hand back camelCase rows of unknown shape. PostgreSQL returns
// BIGINT as a string and TIMESTAMPTZ as a Date; the memory adapter returns
// whatever was stored. These mappers narrow both into typed records.

import type { Account, AuditLogEntry, RecoveryLogEntry, Row, TransactionRecord } from "@fundflow/core";
import {
	ACCOUNT_STATUSES,
	ACCOUNT_TYPES,
	FundflowError,
	RECOVERY_OPERATION_TYPES,
	TRANSACTION_STATUSES,
	TRANSACTION_TYPES,
} from "@fundflow/core";

function malformed(field: string, value: unknown): FundflowError {
	return FundflowError.internal(`Malformed stored value for ${field}: ${String(value)}`);
}

function text(row: Row, field: string): string {
	const value = row[field];
	if (typeof value !== "string") throw malformed(field, value);
	return value;
}

function nullableText(row: Row, field: string): string | null {
	const value = row[field];
	if (value === null || value === undefined) return null;
	return text(row, field);
}

function integer(row: Row, field: string): number {
	const value = row[field];
	const parsed =
		typeof value === "number"
			? value
			: typeof value === "string" || typeof value === "bigint"
				? Number(value)
				: Number.NaN;
	if (!Number.isSafeInteger(parsed)) throw malformed(field, value);
	return parsed;
}

function nullableInteger(row: Row, field: string): number | null {
	const value = row[field];
	if (value === null || value === undefined) return null;
	return integer(row, field);
}

function timestamp(row: Row, field: string): Date {
	const value = row[field];
	const date =
		value instanceof Date
			? value
			: typeof value === "string" || typeof value === "number"
				? new Date(value)
				: null;
	if (!date || Number.isNaN(date.getTime())) throw malformed(field, value);
	return date;
}

function oneOf<T extends string>(row: Row, field: string, allowed: readonly T[]): T {
	const value = row[field];
	const match = allowed.find((candidate) => candidate === value);
	if (match === undefined) throw malformed(field, value);
	return match;
}

function jsonObject(row: Row, field: string): Record<string, unknown> {
	const raw = row[field];
	const value: unknown = typeof raw === "string" ? JSON.parse(raw) : raw;
	if (value === null || value === undefined) return {};
	if (typeof value !== "object" || Array.isArray(value)) throw malformed(field, raw);
	return Object.fromEntries(Object.entries(value));
}

export function toAccount(row: Row): Account {
	return {
		id: text(row, "id"),
		accountNumber: text(row, "accountNumber"),
		customerId: text(row, "customerId"),
		branchId: nullableText(row, "branchId"),
		accountType: oneOf(row, "accountType", ACCOUNT_TYPES),
		balance: integer(row, "balance"),
		status: oneOf(row, "status", ACCOUNT_STATUSES),
		version: integer(row, "version"),
		openedAt: timestamp(row, "openedAt"),
		updatedAt: timestamp(row, "updatedAt"),
	};
}

export function toTransactionRecord(row: Row): TransactionRecord {
	return {
		id: text(row, "id"),
		type: oneOf(row, "type", TRANSACTION_TYPES),
		amount: integer(row, "amount"),
		senderAccountId: nullableText(row, "senderAccountId"),
		receiverAccountId: nullableText(row, "receiverAccountId"),
		description: text(row, "description"),
		status: oneOf(row, "status", TRANSACTION_STATUSES),
		createdAt: timestamp(row, "createdAt"),
	};
}

export function toAuditLogEntry(row: Row): AuditLogEntry {
	return {
		id: text(row, "id"),
		accountId: text(row, "accountId"),
		transactionId: text(row, "transactionId"),
		oldBalance: integer(row, "oldBalance"),
		newBalance: integer(row, "newBalance"),
		accountVersion: integer(row, "accountVersion"),
		operationType: oneOf(row, "operationType", ["BALANCE_UPDATE"] as const),
		changedAt: timestamp(row, "changedAt"),
	};
}

export function toRecoveryLogEntry(row: Row): RecoveryLogEntry {
	return {
		id: text(row, "id"),
		operationType: oneOf(row, "operationType", RECOVERY_OPERATION_TYPES),
		senderAccountId: nullableText(row, "senderAccountId"),
		receiverAccountId: nullableText(row, "receiverAccountId"),
		attemptedAmount: integer(row, "attemptedAmount"),
		failureReason: text(row, "failureReason"),
		errorCode: nullableText(row, "errorCode"),
		senderBalanceAtFailure: nullableInteger(row, "senderBalanceAtFailure"),
		details: jsonObject(row, "details"),
		failedAt: timestamp(row, "failedAt"),
	};
}
