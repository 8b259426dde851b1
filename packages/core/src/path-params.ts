import { PathParamError } from "./errors";
import { parseParamValue } from "./path-matcher";
import type { PathParam, PathParamType, PathParamTypeMap, RequestState, ServerHttpRequest } from "./types";

const NO_PARAMS: readonly PathParam[] = Object.freeze([]);

/**
 * Gets the path parameters captured when the request was dispatched by a {@link PathHandler}.
 *
 * @returns The parameters in pattern order, or an empty list if no mapping matched
 */
export function getPathParams<T extends RequestState>(request: ServerHttpRequest<T>): readonly PathParam[] {
	return request.pathParams ?? NO_PARAMS;
}

/**
 * Gets the raw text of a single path parameter.
 */
export function getPathParam<T extends RequestState>(request: ServerHttpRequest<T>, name: string): string | undefined {
	return getPathParams(request).find((param) => param.name === name)?.value;
}

/**
 * Gets a path parameter's value parsed as the given type.
 * Falls back to `defaultValue` when the parameter is absent or its text does not parse.
 *
 * @example
 * ```typescript
 * // Mapped with "/users/:id:ulong", requested as "/users/34"
 * getPathParamAs(request, "id", "ulong", 0n); // 34n
 * getPathParamAs(request, "page", "uint", 1); // 1
 * getPathParamAs(request, "page", "uint"); // undefined
 * ```
 */
export function getPathParamAs<T extends RequestState, K extends PathParamType>(request: ServerHttpRequest<T>, name: string, type: K): PathParamTypeMap[K] | undefined;
export function getPathParamAs<T extends RequestState, K extends PathParamType>(
	request: ServerHttpRequest<T>,
	name: string,
	type: K,
	defaultValue: PathParamTypeMap[K]
): PathParamTypeMap[K];
export function getPathParamAs<T extends RequestState, K extends PathParamType>(
	request: ServerHttpRequest<T>,
	name: string,
	type: K,
	defaultValue?: PathParamTypeMap[K]
): PathParamTypeMap[K] | undefined {
	const raw = getPathParam(request, name);
	if (raw === undefined) return defaultValue;
	return parseParamValue(raw, type) ?? defaultValue;
}

/**
 * Strict variant of {@link getPathParamAs} for handlers that treat a missing or
 * malformed parameter as an error instead of falling back to a default.
 *
 * @throws {PathParamError} If the parameter is absent or does not parse as `type`
 */
export function requirePathParamAs<T extends RequestState, K extends PathParamType>(request: ServerHttpRequest<T>, name: string, type: K): PathParamTypeMap[K] {
	const raw = getPathParam(request, name);
	if (raw === undefined) {
		throw new PathParamError(name, `Path parameter "${name}" is not present.`);
	}
	const value = parseParamValue(raw, type);
	if (value === undefined) {
		throw new PathParamError(name, `Path parameter "${name}" with value "${raw}" is not a valid ${type}.`);
	}
	return value;
}
