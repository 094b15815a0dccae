import { describe, expect, it } from "vitest";
import { generateId } from "../utils/id.js";
import { decimalToMinor, getCurrencyPrecision, getDecimalPlaces, minorToDecimal } from "../utils/money.js";

describe("minorToDecimal", () => {
	it("converts USD minor units to 2 decimal places", () => {
		expect(minorToDecimal(10000, "USD")).toBe("100.00");
		expect(minorToDecimal(7000)).toBe("70.00");
	});

	it("converts JPY with no decimal places", () => {
		expect(minorToDecimal(10000, "JPY")).toBe("10000");
	});

	it("converts BHD with 3 decimal places", () => {
		expect(minorToDecimal(10000, "BHD")).toBe("10.000");
	});

	it("handles zero and negative amounts", () => {
		expect(minorToDecimal(0)).toBe("0.00");
		expect(minorToDecimal(-500)).toBe("-5.00");
	});
});

describe("decimalToMinor", () => {
	it("parses decimal strings", () => {
		expect(decimalToMinor("30.00")).toBe(3000);
		expect(decimalToMinor("254.9")).toBe(25490);
		expect(decimalToMinor(" 150 ")).toBe(15000);
	});

	it("parses numbers in major units", () => {
		expect(decimalToMinor(30)).toBe(3000);
		expect(decimalToMinor(0.5)).toBe(50);
	});

	it("keeps the sign", () => {
		expect(decimalToMinor("-10.00")).toBe(-1000);
	});

	it("respects the currency's decimal places", () => {
		expect(decimalToMinor("5", "JPY")).toBe(5);
		expect(decimalToMinor("5.5", "JPY")).toBeNull();
		expect(decimalToMinor("1.234", "KWD")).toBe(1234);
	});

	it("rejects more fraction digits than the currency has", () => {
		expect(decimalToMinor("1.005")).toBeNull();
		expect(decimalToMinor(0.1 + 0.2)).toBeNull();
	});

	it("rejects anything that is not a plain decimal", () => {
		expect(decimalToMinor("abc")).toBeNull();
		expect(decimalToMinor("1e3")).toBeNull();
		expect(decimalToMinor("")).toBeNull();
		expect(decimalToMinor(Number.NaN)).toBeNull();
		expect(decimalToMinor(Number.POSITIVE_INFINITY)).toBeNull();
	});

	it("rejects values beyond the safe integer range", () => {
		expect(decimalToMinor("900719925474099.99")).toBeNull();
	});
});

describe("currency tables", () => {
	it("returns precision and decimal places", () => {
		expect(getCurrencyPrecision("USD")).toBe(100);
		expect(getCurrencyPrecision("KRW")).toBe(1);
		expect(getCurrencyPrecision("KWD")).toBe(1000);
		expect(getDecimalPlaces("EUR")).toBe(2);
		expect(getDecimalPlaces("JPY")).toBe(0);
	});

	it("falls back to 2 decimals for unknown currencies", () => {
		expect(getCurrencyPrecision("XYZ")).toBe(100);
		expect(getDecimalPlaces("XYZ")).toBe(2);
	});
});

describe("generateId", () => {
	it("returns distinct UUID v4 strings", () => {
		const a = generateId();
		const b = generateId();
		expect(a).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
		expect(a).not.toBe(b);
	});
});
