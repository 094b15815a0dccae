import type { FundflowAdapter } from "@fundflow/core";

export interface HeldLock {
	/** Let the holding unit of work commit and wait for it to finish */
	release: () => Promise<void>;
}

/**
 * Open a unit of work that takes the row lock on an account and keeps it
 * until `release` is called, the way a slow concurrent writer would.
 */
export async function holdAccountLock(adapter: FundflowAdapter, accountId: string): Promise<HeldLock> {
	let letGo: () => void = () => undefined;
	const released = new Promise<void>((resolve) => {
		letGo = resolve;
	});
	let markLocked: () => void = () => undefined;
	const locked = new Promise<void>((resolve) => {
		markLocked = resolve;
	});

	const done = adapter.transaction(async (tx) => {
		await tx.findOne({
			model: "accounts",
			where: [{ field: "id", operator: "eq", value: accountId }],
			forUpdate: true,
		});
		markLocked();
		await released;
	});
	await Promise.race([locked, done]);

	return {
		release: async () => {
			letGo();
			await done;
		},
	};
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
