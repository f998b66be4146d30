export {
	type ActivateVersionMessage,
	decodeMessage,
	type ProtocolMessage,
	type RecordMessage,
	type SchemaMessage,
	type StateMessage,
} from "./messages";
export { parseLine, parseMessageLine, parseNumber } from "./parse";
