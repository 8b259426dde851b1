/**
 * HTTP methods understood by the dispatcher, in bit order.
 *
 * @example
 * ```typescript
 * const method: HttpMethod = "GET";
 * handler.addMapping(method, "/users", listUsers);
 * ```
 */
export type HttpMethod = "GET" | "HEAD" | "POST" | "PUT" | "DELETE" | "CONNECT" | "OPTIONS" | "TRACE" | "PATCH";

/**
 * Shape of the request-scoped state shared between filters and handlers.
 */
export type RequestState = Record<string, unknown>;

/**
 * Name of a path parameter type that may follow a parameter name in a pattern,
 * as in `/users/:id:ulong`.
 */
export type PathParamType = "string" | "int" | "uint" | "long" | "ulong" | "double";

/**
 * Maps each path parameter type to the value it parses into.
 * 64-bit integer types use `bigint` so no precision is lost.
 */
export interface PathParamTypeMap {
	string: string;
	int: number;
	uint: number;
	long: bigint;
	ulong: bigint;
	double: number;
}

/**
 * A named value captured from a URL path segment.
 *
 * @example
 * ```typescript
 * // Pattern "/users/:id:ulong" against "/users/34"
 * const param: PathParam = { name: "id", value: "34", type: "ulong" };
 * ```
 */
export interface PathParam {
	/** Parameter name, without the leading ':' */
	readonly name: string;
	/** Decoded text of the matched segment */
	readonly value: string;
	/** Type declared in the pattern, "string" when none was given */
	readonly type: PathParamType;
}

/**
 * Result of matching a URL path against a single pattern.
 */
export interface PathMatchResult {
	matches: boolean;
	params: readonly PathParam[];
}

/**
 * An incoming request as seen by handlers and filters.
 *
 * @template T - The type of the request-scoped state object
 */
export interface ServerHttpRequest<T extends RequestState = RequestState> {
	/** The request method */
	readonly method: HttpMethod;
	/** Request target: the path plus an optional query string, e.g. `/users/34?expand=1` */
	readonly url: string;
	/** Request headers */
	readonly headers: Headers;
	/** Request body stream, if any */
	readonly body: ReadableStream<Uint8Array> | null;
	/** Address of the remote peer, when the host server provides it */
	readonly remoteAddress?: string;
	/** Request-scoped state for sharing data between filters and handlers */
	state: T;
	/** Path parameters captured by the route table; unset until a mapping matches */
	pathParams?: readonly PathParam[];
}

/**
 * The response being assembled for a request. Handlers and filters mutate it in place.
 */
export interface ServerHttpResponse {
	/** HTTP status code (default: 200) */
	status: number;
	/** Response headers */
	readonly headers: Headers;
	/** Response body, `null` for an empty body */
	body: string | Uint8Array | null;
}

/**
 * Something that can handle a request by mutating the response.
 *
 * @template T - The type of the request-scoped state object
 *
 * @example
 * ```typescript
 * class HealthHandler implements HttpRequestHandler {
 *   handle(request: ServerHttpRequest, response: ServerHttpResponse) {
 *     response.status = HttpStatus.OK;
 *     response.body = "ok";
 *   }
 * }
 * ```
 */
export interface HttpRequestHandler<T extends RequestState = RequestState> {
	handle(request: ServerHttpRequest<T>, response: ServerHttpResponse): void | Promise<void>;
}

/**
 * Plain function form of {@link HttpRequestHandler}.
 */
export type HttpRequestHandlerFunction<T extends RequestState = RequestState> = (request: ServerHttpRequest<T>, response: ServerHttpResponse) => void | Promise<void>;

/**
 * Anything accepted where a handler is expected.
 */
export type HandlerLike<T extends RequestState = RequestState> = HttpRequestHandler<T> | HttpRequestHandlerFunction<T>;

/**
 * The remaining portion of a filter chain. Calling `doFilter` proceeds past the current filter.
 *
 * @template T - The type of the request-scoped state object
 */
export interface FilterContinuation<T extends RequestState = RequestState> {
	doFilter(request: ServerHttpRequest<T>, response: ServerHttpResponse): Promise<void>;
}

/**
 * A middleware unit that may inspect or modify the request and response, then either
 * proceed with `next.doFilter(request, response)` or return without calling it to
 * short-circuit. When the chain is short-circuited, the response as currently set is final.
 *
 * @template T - The type of the request-scoped state object
 *
 * @example
 * ```typescript
 * const requireJson: HttpRequestFilter = {
 *   async doFilter(request, response, next) {
 *     if (request.headers.get("content-type") !== "application/json") {
 *       response.status = HttpStatus.UNSUPPORTED_MEDIA_TYPE;
 *       return;
 *     }
 *     await next.doFilter(request, response);
 *   },
 * };
 * ```
 */
export interface HttpRequestFilter<T extends RequestState = RequestState> {
	doFilter(request: ServerHttpRequest<T>, response: ServerHttpResponse, next: FilterContinuation<T>): void | Promise<void>;
}

/**
 * Plain function form of {@link HttpRequestFilter}.
 */
export type HttpRequestFilterFunction<T extends RequestState = RequestState> = (
	request: ServerHttpRequest<T>,
	response: ServerHttpResponse,
	next: FilterContinuation<T>
) => void | Promise<void>;

/**
 * Anything accepted where a filter is expected.
 */
export type FilterLike<T extends RequestState = RequestState> = HttpRequestFilter<T> | HttpRequestFilterFunction<T>;
