/**
 * Convert smallest units (cents) to decimal string.
 * 25490 → "254.90"
 */
export function minorToDecimal(amount: number, currency = "USD"): string {
	const precision = getCurrencyPrecision(currency);
	const major = amount / precision;
	const decimals = getDecimalPlaces(currency);
	return major.toFixed(decimals);
}

const DECIMAL_PATTERN = /^(-)?(\d+)(?:\.(\d+))?$/;

/**
 * Parse a decimal amount in major units into smallest units.
 * "254.90" → 25490, 30 → 3000.
 *
 * Returns null when the value is not a plain decimal, carries more fraction
 * digits than the currency allows, or falls outside the safe integer range.
 */
export function decimalToMinor(value: string | number, currency = "USD"): number | null {
	if (typeof value === "number" && !Number.isFinite(value)) return null;

	const match = DECIMAL_PATTERN.exec(String(value).trim());
	if (!match) return null;

	const [, sign, whole = "0", fraction = ""] = match;
	const decimals = getDecimalPlaces(currency);
	if (fraction.length > decimals) return null;

	const minor =
		Number(whole) * getCurrencyPrecision(currency) + Number(fraction.padEnd(decimals, "0") || "0");
	if (!Number.isSafeInteger(minor)) return null;
	return sign ? -minor : minor;
}

/**
 * Get precision (subunit count) for a currency.
 * USD → 100 (100 cents = 1 dollar)
 */
export function getCurrencyPrecision(currency: string): number {
	switch (currency) {
		case "JPY":
		case "KRW":
			return 1;
		case "BHD":
		case "KWD":
			return 1000;
		default:
			return 100;
	}
}

/**
 * Get decimal places for display.
 */
export function getDecimalPlaces(currency: string): number {
	switch (currency) {
		case "JPY":
		case "KRW":
			return 0;
		case "BHD":
		case "KWD":
			return 3;
		default:
			return 2;
	}
}
