import { isInteger, isSafeNumber, LosslessNumber, parse } from "lossless-json";
import { type InvalidMessageError, ParseError, toError } from "../result/errors";
import { Err, flatMapResult, Ok, type Result } from "../result/result";
import { decodeMessage, type ProtocolMessage } from "./messages";

/**
 * Keep safe integers as numbers and every other numeric literal as its exact
 * text, so decimals never pass through binary floating point.
 */
export function parseNumber(text: string): number | LosslessNumber {
	if (isInteger(text) && isSafeNumber(text)) {
		return Number(text);
	}
	return new LosslessNumber(text);
}

/**
 * Parse one input line as JSON.
 *
 * @param line - The raw line, without its terminator
 * @param lineNumber - 1-based position in the input, reported on failure
 */
export function parseLine(line: string, lineNumber: number): Result<unknown, ParseError> {
	try {
		return Ok(parse(line, null, parseNumber));
	} catch (error) {
		return Err(new ParseError(lineNumber, line, toError(error)));
	}
}

/** Parse and decode one input line into a protocol message. */
export function parseMessageLine(
	line: string,
	lineNumber: number,
): Result<ProtocolMessage, ParseError | InvalidMessageError> {
	return flatMapResult<unknown, ProtocolMessage, ParseError | InvalidMessageError>(
		parseLine(line, lineNumber),
		decodeMessage,
	);
}
