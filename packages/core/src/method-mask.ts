import { InvalidConfigurationError } from "./errors";
import type { HttpMethod } from "./types";

/**
 * Every known HTTP method. A method's position in this list is its bit index.
 */
export const HTTP_METHODS: readonly HttpMethod[] = Object.freeze(["GET", "HEAD", "POST", "PUT", "DELETE", "CONNECT", "OPTIONS", "TRACE", "PATCH"]);

/**
 * Maps each HTTP method to its own bit, so a set of methods can be stored as a bitmask.
 */
export const HTTP_METHOD_BITS: Readonly<Record<HttpMethod, number>> = Object.freeze({
	GET: 1 << 0,
	HEAD: 1 << 1,
	POST: 1 << 2,
	PUT: 1 << 3,
	DELETE: 1 << 4,
	CONNECT: 1 << 5,
	OPTIONS: 1 << 6,
	TRACE: 1 << 7,
	PATCH: 1 << 8,
});

const ALL_METHODS_MASK = HTTP_METHODS.reduce((mask, method) => mask | HTTP_METHOD_BITS[method], 0);

/**
 * Narrows an arbitrary string to a known HTTP method. Matching is case-sensitive,
 * as method names are.
 *
 * @returns The method, or `undefined` when the value is not a known method
 */
export function parseHttpMethod(value: string): HttpMethod | undefined {
	return HTTP_METHODS.find((method) => method === value);
}

/**
 * Gets the bit assigned to a single method.
 *
 * @throws {InvalidConfigurationError} If the value is not a known method
 */
export function methodBit(method: HttpMethod): number {
	// Values can arrive untyped from plain JavaScript callers
	const known = parseHttpMethod(method);
	if (!known) {
		throw new InvalidConfigurationError(`Unknown HTTP method "${String(method)}".`);
	}
	return HTTP_METHOD_BITS[known];
}

/**
 * Computes a bitmask from a list of HTTP methods.
 *
 * @throws {InvalidConfigurationError} If the list is empty or contains an unknown method
 *
 * @example
 * ```typescript
 * methodMaskFromMethods(["GET", "HEAD"]); // 0b11
 * ```
 */
export function methodMaskFromMethods(methods: readonly HttpMethod[]): number {
	if (methods.length === 0) {
		throw new InvalidConfigurationError("A mapping needs at least one HTTP method.");
	}
	let mask = 0;
	for (const method of methods) {
		mask |= methodBit(method);
	}
	return mask;
}

/**
 * Gets a bitmask that matches every known HTTP method.
 */
export function methodMaskFromAll(): number {
	return ALL_METHODS_MASK;
}

/**
 * Tests whether a mask includes a method.
 */
export function maskIncludes(mask: number, method: HttpMethod): boolean {
	return (mask & HTTP_METHOD_BITS[method]) !== 0;
}

/**
 * Lists the methods contained in a mask, in bit order.
 */
export function methodsFromMask(mask: number): HttpMethod[] {
	return HTTP_METHODS.filter((method) => (mask & HTTP_METHOD_BITS[method]) !== 0);
}
