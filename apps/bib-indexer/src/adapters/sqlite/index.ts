export { HoldingsDatabase, type HoldingRow } from "./HoldingsDatabase.js";
export { SqliteDocumentWriter, type DocumentRow } from "./SqliteDocumentWriter.js";
