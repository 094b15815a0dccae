export { generateId } from "./id.js";
export { decimalToMinor, getCurrencyPrecision, getDecimalPlaces, minorToDecimal } from "./money.js";
