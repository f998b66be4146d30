export { projectRecord } from "./project";
export {
	type ColumnDefinition,
	type ColumnMode,
	type ColumnType,
	literalColumnType,
	translateField,
	translateSchema,
} from "./translate";
export {
	type ArrayNode,
	decodeTypeNode,
	isRecord,
	LITERAL_TYPES,
	type LiteralNode,
	type LiteralType,
	type ObjectNode,
	type PropertyNode,
	type ResolvedNode,
	resolveNode,
	type TypeNode,
	type UnionNode,
} from "./type-node";
