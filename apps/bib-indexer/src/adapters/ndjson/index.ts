export { NdjsonRecordReader, NdjsonLineError } from "./NdjsonRecordReader.js";
export { NdjsonDocumentWriter, type NdjsonDocumentWriterConfig } from "./NdjsonDocumentWriter.js";
