import { randomInt } from "node:crypto";

/** `ACC` followed by ten digits. */
export function generateAccountNumber(): string {
	const digits = Array.from({ length: 10 }, () => randomInt(10)).join("");
	return `ACC${digits}`;
}
