export { assertAccountBalance, assertIntegrity, assertTotalBalance } from "./assertions.js";
export {
	createSteppingClock,
	createTestAdapter,
	getTestInstance,
	type TestInstance,
	type TestInstanceOptions,
} from "./get-test-instance.js";
export { type SeedAccount, seedAccount, seedAccounts } from "./seed.js";
