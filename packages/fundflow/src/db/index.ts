export { appendOnlyTriggersSQL, createTableSQL, generateSchemaSQL } from "./ddl.js";
export { getFundflowTables, getUniqueFields, type ModelName, MODELS } from "./schema.js";
