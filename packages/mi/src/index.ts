export { MiParseError, isResultClass, parseMiLine } from "./parser.js";
export {
	formatMiRecord,
	formatMiResults,
	formatMiValue,
	quoteCString,
} from "./format.js";
export {
	describeFrame,
	describeStop,
	findResult,
	getInteger,
	getList,
	getString,
	getTuple,
	isList,
	isTuple,
} from "./values.js";
