export * from "./ledger-record.schema.js";
