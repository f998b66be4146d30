export { sanitizeFieldName } from "./identifier";
export { createRecordValidator, type RecordValidator } from "./record-validator";
