// =============================================================================
// FUNDFLOW -- Main entry point
// =============================================================================
// Creates the fundflow instance: account lifecycle, the transfer engine, the
// actor-facing gateway, audit and recovery logs, and read-only reports.

import type {
	Account,
	AccountType,
	AuditLogEntry,
	FundflowContext,
	FundflowOptions,
	RecoveryLogEntry,
	TransactionRecord,
} from "@fundflow/core";
import { validateConfig } from "../config/index.js";
import { buildContext } from "../context/context.js";
import * as accountManager from "../managers/account-manager.js";
import * as accountStore from "../managers/account-store.js";
import * as audit from "../managers/audit-recorder.js";
import * as gateway from "../managers/transfer-gateway.js";
import * as integrity from "../managers/integrity.js";
import * as recovery from "../managers/recovery-recorder.js";
import * as reports from "../managers/reporting.js";
import * as engine from "../managers/transfer-engine.js";

// =============================================================================
// FUNDFLOW INTERFACE
// =============================================================================

export interface Fundflow {
	accounts: {
		open: (params: {
			customerId: string;
			accountType: AccountType;
			accountNumber?: string;
			branchId?: string | null;
			/** Minor units */
			initialDeposit?: number;
		}) => Promise<Account>;
		/** Look up by account number */
		get: (accountNumber: string) => Promise<Account | null>;
		getById: (accountId: string) => Promise<Account | null>;
		listForCustomer: (customerId: string) => Promise<Account[]>;
		freeze: (accountId: string) => Promise<Account>;
		unfreeze: (accountId: string) => Promise<Account>;
		close: (accountId: string) => Promise<Account>;
	};
	transfers: {
		/** Amounts are minor units */
		transfer: (params: {
			senderAccountId: string;
			receiverAccountId: string;
			amount: number;
			description?: string;
		}) => Promise<TransactionRecord>;
		deposit: (params: {
			accountId: string;
			amount: number;
			description?: string;
		}) => Promise<TransactionRecord>;
		withdraw: (params: {
			accountId: string;
			amount: number;
			description?: string;
		}) => Promise<TransactionRecord>;
	};
	gateway: {
		transferFunds: (params: gateway.TransferFundsParams) => Promise<TransactionRecord>;
		simulateFailure: (params: {
			actorCustomerId: string;
			senderAccountId: string;
		}) => Promise<gateway.SimulatedFailureResult>;
	};
	audit: {
		list: (accountId: string) => Promise<AuditLogEntry[]>;
		verify: (accountId: string) => Promise<integrity.AuditTrailResult>;
	};
	recovery: {
		list: (params?: { limit?: number; offset?: number }) => Promise<RecoveryLogEntry[]>;
	};
	reports: {
		getTransaction: (transactionId: string) => Promise<TransactionRecord>;
		listAccountTransactions: (
			accountId: string,
			params?: { limit?: number; offset?: number },
		) => Promise<TransactionRecord[]>;
		getAccountSnapshot: (accountNumber: string) => Promise<reports.AccountSnapshot>;
		getSummary: () => Promise<reports.FundflowSummary>;
		/** Across every account the customer holds, newest first */
		listCustomerTransactions: (
			customerId: string,
			params?: { limit?: number; offset?: number },
		) => Promise<TransactionRecord[]>;
		listCustomerAuditLog: (customerId: string) => Promise<AuditLogEntry[]>;
		getCustomerOverview: () => Promise<reports.CustomerOverview[]>;
		getBranchSummary: () => Promise<reports.BranchSummary[]>;
		verifyIntegrity: () => Promise<integrity.IntegrityReport>;
	};
	$context: Promise<FundflowContext>;
	$options: FundflowOptions;
}

// =============================================================================
// CREATE FUNDFLOW
// =============================================================================

export function createFundflow(options: FundflowOptions): Fundflow {
	// Reject bad options here rather than through a promise nobody awaits yet.
	validateConfig(options);

	const ctxPromise = buildContext(options);
	const getCtx = () => ctxPromise;

	return {
		accounts: {
			open: async (params) => {
				const ctx = await getCtx();
				return accountManager.openAccount(ctx, params);
			},
			get: async (accountNumber) => {
				const ctx = await getCtx();
				return accountStore.getAccount(ctx, accountNumber);
			},
			getById: async (accountId) => {
				const ctx = await getCtx();
				return accountStore.getAccountById(ctx, accountId);
			},
			listForCustomer: async (customerId) => {
				const ctx = await getCtx();
				return accountStore.listAccounts(ctx, { customerId });
			},
			freeze: async (accountId) => {
				const ctx = await getCtx();
				return accountManager.freezeAccount(ctx, accountId);
			},
			unfreeze: async (accountId) => {
				const ctx = await getCtx();
				return accountManager.unfreezeAccount(ctx, accountId);
			},
			close: async (accountId) => {
				const ctx = await getCtx();
				return accountManager.closeAccount(ctx, accountId);
			},
		},
		transfers: {
			transfer: async (params) => {
				const ctx = await getCtx();
				return engine.transfer(ctx, params);
			},
			deposit: async (params) => {
				const ctx = await getCtx();
				return engine.deposit(ctx, params);
			},
			withdraw: async (params) => {
				const ctx = await getCtx();
				return engine.withdraw(ctx, params);
			},
		},
		gateway: {
			transferFunds: async (params) => {
				const ctx = await getCtx();
				return gateway.transferFunds(ctx, params);
			},
			simulateFailure: async (params) => {
				const ctx = await getCtx();
				return gateway.simulateFailure(ctx, params);
			},
		},
		audit: {
			list: async (accountId) => {
				const ctx = await getCtx();
				return audit.listAuditLog(ctx, accountId);
			},
			verify: async (accountId) => {
				const ctx = await getCtx();
				return integrity.verifyAuditTrail(ctx, accountId);
			},
		},
		recovery: {
			list: async (params) => {
				const ctx = await getCtx();
				return recovery.listRecoveryLogs(ctx, params);
			},
		},
		reports: {
			getTransaction: async (transactionId) => {
				const ctx = await getCtx();
				return reports.getTransaction(ctx, transactionId);
			},
			listAccountTransactions: async (accountId, params) => {
				const ctx = await getCtx();
				return reports.listAccountTransactions(ctx, accountId, params);
			},
			getAccountSnapshot: async (accountNumber) => {
				const ctx = await getCtx();
				return reports.getAccountSnapshot(ctx, accountNumber);
			},
			getSummary: async () => {
				const ctx = await getCtx();
				return reports.getSummary(ctx);
			},
			listCustomerTransactions: async (customerId, params) => {
				const ctx = await getCtx();
				return reports.listCustomerTransactions(ctx, customerId, params);
			},
			listCustomerAuditLog: async (customerId) => {
				const ctx = await getCtx();
				return reports.listCustomerAuditLog(ctx, customerId);
			},
			getCustomerOverview: async () => {
				const ctx = await getCtx();
				return reports.getCustomerOverview(ctx);
			},
			getBranchSummary: async () => {
				const ctx = await getCtx();
				return reports.getBranchSummary(ctx);
			},
			verifyIntegrity: async () => {
				const ctx = await getCtx();
				return integrity.verifyIntegrity(ctx);
			},
		},
		$context: ctxPromise,
		$options: options,
	};
}
