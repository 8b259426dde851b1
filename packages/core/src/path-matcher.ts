import { InvalidPatternError } from "./errors";
import { getRequestPath } from "./http";
import type { PathMatchResult, PathParam, PathParamType, PathParamTypeMap } from "./types";

const INT_PATTERN = /^[+-]?\d+$/;
const UINT_PATTERN = /^\+?\d+$/;
const DOUBLE_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;
const UINT32_MAX = 2 ** 32 - 1;
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;
const UINT64_MAX = 2n ** 64n - 1n;

/**
 * Parsers for each path parameter type. Each returns `undefined` when the text
 * does not represent a value of that type.
 */
const PARAM_PARSERS: { [K in PathParamType]: (raw: string) => PathParamTypeMap[K] | undefined } = {
	string: (raw) => raw,
	int: (raw) => {
		if (!INT_PATTERN.test(raw)) return undefined;
		const value = Number(raw);
		return value >= INT32_MIN && value <= INT32_MAX ? value : undefined;
	},
	uint: (raw) => {
		if (!UINT_PATTERN.test(raw)) return undefined;
		const value = Number(raw);
		return value <= UINT32_MAX ? value : undefined;
	},
	long: (raw) => {
		if (!INT_PATTERN.test(raw)) return undefined;
		const value = BigInt(raw);
		return value >= INT64_MIN && value <= INT64_MAX ? value : undefined;
	},
	ulong: (raw) => {
		if (!UINT_PATTERN.test(raw)) return undefined;
		const value = BigInt(raw);
		return value <= UINT64_MAX ? value : undefined;
	},
	double: (raw) => {
		if (!DOUBLE_PATTERN.test(raw)) return undefined;
		const value = Number(raw);
		return Number.isFinite(value) ? value : undefined;
	},
};

/**
 * Narrows a string to a known path parameter type name.
 */
export function isPathParamType(value: string): value is PathParamType {
	return Object.prototype.hasOwnProperty.call(PARAM_PARSERS, value);
}

/**
 * Parses raw parameter text as the given type.
 *
 * @returns The parsed value, or `undefined` if the text is not a valid value of that type
 *
 * @example
 * ```typescript
 * parseParamValue("34", "ulong"); // 34n
 * parseParamValue("-1", "uint"); // undefined
 * parseParamValue("2.5", "double"); // 2.5
 * ```
 */
export function parseParamValue<K extends PathParamType>(raw: string, type: K): PathParamTypeMap[K] | undefined {
	const parse: (raw: string) => PathParamTypeMap[K] | undefined = PARAM_PARSERS[type];
	return parse(raw);
}

type PatternSegment =
	| { kind: "literal"; text: string }
	| { kind: "param"; name: string; type: PathParamType }
	| { kind: "single-wildcard" }
	| { kind: "multi-wildcard" };

/**
 * A pattern compiled once and matched against many paths.
 */
export interface CompiledPathPattern {
	/** The pattern source */
	readonly pattern: string;
	/**
	 * Matches a path (or a request target with a query string) against the pattern.
	 * Never throws; anything that does not fit the pattern is a non-match.
	 */
	match(path: string): PathMatchResult;
}

const NO_MATCH: PathMatchResult = Object.freeze({ matches: false, params: Object.freeze([]) });

/**
 * Splits a path into segments, ignoring empty ones.
 */
function splitSegments(path: string): string[] {
	return path.split("/").filter(Boolean);
}

function parseSegment(pattern: string, segment: string, isLast: boolean, names: Set<string>): PatternSegment {
	if (segment === "**") {
		if (!isLast) throw new InvalidPatternError(pattern, `"**" may only appear as the last segment`);
		return { kind: "multi-wildcard" };
	}
	if (segment === "*") {
		return { kind: "single-wildcard" };
	}
	if (!segment.startsWith(":")) {
		return { kind: "literal", text: segment };
	}

	const separator = segment.indexOf(":", 1);
	const name = separator === -1 ? segment.slice(1) : segment.slice(1, separator);
	const typeName = separator === -1 ? "string" : segment.slice(separator + 1);

	if (!name) throw new InvalidPatternError(pattern, `parameter in segment "${segment}" has no name`);
	if (!isPathParamType(typeName)) throw new InvalidPatternError(pattern, `unknown parameter type "${typeName}"`);
	if (names.has(name)) throw new InvalidPatternError(pattern, `duplicate parameter name "${name}"`);
	names.add(name);

	return { kind: "param", name, type: typeName };
}

function decodeSegment(segment: string): string | undefined {
	try {
		return decodeURIComponent(segment);
	} catch {
		return undefined;
	}
}

/**
 * Compiles a path pattern.
 *
 * Pattern grammar, one rule per `/`-separated segment:
 * - `users` matches exactly that segment, compared with the percent-decoded path segment
 * - `*` matches any single segment
 * - `**` matches zero or more segments, and must be last
 * - `:id` captures one segment as a string parameter
 * - `:id:ulong` captures one segment that parses as the given type
 *   (`string`, `int`, `uint`, `long`, `ulong` or `double`)
 *
 * @throws {InvalidPatternError} If the pattern does not follow the grammar
 *
 * @example
 * ```typescript
 * const users = compilePathPattern("/users/:id:ulong");
 * users.match("/users/34"); // { matches: true, params: [{ name: "id", value: "34", type: "ulong" }] }
 * users.match("/users/abc"); // { matches: false, params: [] }
 * ```
 */
export function compilePathPattern(pattern: string): CompiledPathPattern {
	if (!pattern.startsWith("/")) {
		throw new InvalidPatternError(pattern, `patterns must start with "/"`);
	}

	const names = new Set<string>();
	const rawSegments = splitSegments(pattern);
	const segments = rawSegments.map((segment, i) => parseSegment(pattern, segment, i === rawSegments.length - 1, names));
	const segmentCount = segments.length;
	const hasMultiWildcard = segments[segmentCount - 1]?.kind === "multi-wildcard";
	const fixedCount = hasMultiWildcard ? segmentCount - 1 : segmentCount;

	return {
		pattern,
		match(path: string): PathMatchResult {
			const pathSegments = splitSegments(getRequestPath(path));

			// Quick length check before looking at any segment
			if (hasMultiWildcard ? pathSegments.length < fixedCount : pathSegments.length !== segmentCount) {
				return NO_MATCH;
			}

			const params: PathParam[] = [];
			for (let i = 0; i < fixedCount; i++) {
				const seg = segments[i];
				const part = pathSegments[i];
				if (seg === undefined || part === undefined) return NO_MATCH;

				if (seg.kind !== "literal" && seg.kind !== "param") continue;

				const value = decodeSegment(part);
				if (value === undefined) return NO_MATCH;
				if (seg.kind === "literal") {
					if (seg.text !== value) return NO_MATCH;
				} else {
					if (parseParamValue(value, seg.type) === undefined) return NO_MATCH;
					params.push({ name: seg.name, value, type: seg.type });
				}
			}

			return { matches: true, params };
		},
	};
}

/**
 * Matches a path against a pattern in one call.
 *
 * @throws {InvalidPatternError} If the pattern does not follow the grammar
 */
export function matchPath(path: string, pattern: string): PathMatchResult {
	return compilePathPattern(pattern).match(path);
}
