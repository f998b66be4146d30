export { formatCheckpoint } from "./checkpoint";
export { encodeRow, renderDecimals, serializeRow, type StorageRow } from "./row";
