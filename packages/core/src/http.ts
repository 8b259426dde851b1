import type {
	FilterLike,
	HandlerLike,
	HttpMethod,
	HttpRequestFilter,
	HttpRequestHandler,
	RequestState,
	ServerHttpRequest,
	ServerHttpResponse,
} from "./types";

/**
 * Status codes used throughout the dispatcher and filters.
 */
export const HttpStatus = {
	OK: 200,
	CREATED: 201,
	NO_CONTENT: 204,
	RESET_CONTENT: 205,
	NOT_MODIFIED: 304,
	BAD_REQUEST: 400,
	UNAUTHORIZED: 401,
	FORBIDDEN: 403,
	NOT_FOUND: 404,
	METHOD_NOT_ALLOWED: 405,
	UNSUPPORTED_MEDIA_TYPE: 415,
	INTERNAL_SERVER_ERROR: 500,
	NOT_IMPLEMENTED: 501,
} as const;

/**
 * Options for {@link createServerRequest}.
 */
export interface ServerRequestInit<T extends RequestState = RequestState> {
	/** Request method (default: "GET") */
	method?: HttpMethod;
	/** Request target (default: "/") */
	url?: string;
	/** Request headers, as a `Headers` instance or a plain record */
	headers?: Headers | Record<string, string>;
	/** Request body stream */
	body?: ReadableStream<Uint8Array> | null;
	/** Remote peer address */
	remoteAddress?: string;
	/** Initial request-scoped state */
	state?: T;
}

/**
 * Creates a request object. Used by the fetch adapter and by tests.
 *
 * @example
 * ```typescript
 * const request = createServerRequest({ method: "GET", url: "/users/34" });
 * const response = createServerResponse();
 * await handler.handle(request, response);
 * ```
 */
export function createServerRequest(init?: ServerRequestInit): ServerHttpRequest;
export function createServerRequest<T extends RequestState>(init: ServerRequestInit<T> & { state: T }): ServerHttpRequest<T>;
export function createServerRequest(init: ServerRequestInit = {}): ServerHttpRequest {
	return {
		method: init.method ?? "GET",
		url: init.url ?? "/",
		headers: init.headers instanceof Headers ? init.headers : new Headers(init.headers),
		body: init.body ?? null,
		remoteAddress: init.remoteAddress,
		state: init.state ?? {},
	};
}

/**
 * Creates an empty response with status 200.
 */
export function createServerResponse(): ServerHttpResponse {
	return {
		status: HttpStatus.OK,
		headers: new Headers(),
		body: null,
	};
}

/**
 * Extracts the pathname from a request target, dropping any query string or fragment.
 * Absolute URLs are reduced to their path.
 *
 * @example
 * ```typescript
 * getRequestPath("/users/34?expand=1"); // "/users/34"
 * getRequestPath("http://localhost:3000/api/test#top"); // "/api/test"
 * getRequestPath(""); // "/"
 * ```
 */
export function getRequestPath(url: string): string {
	// Fast path: pathname-only targets (most common case)
	if (url[0] === "/" && !url.includes("?") && !url.includes("#")) {
		return url;
	}

	const queryStart = url.indexOf("?");
	const hashStart = url.indexOf("#");

	let pathnameEnd = url.length;
	if (queryStart !== -1) pathnameEnd = Math.min(pathnameEnd, queryStart);
	if (hashStart !== -1) pathnameEnd = Math.min(pathnameEnd, hashStart);

	const protocolEnd = url.indexOf("://");
	if (protocolEnd !== -1 && protocolEnd < pathnameEnd) {
		const pathStart = url.indexOf("/", protocolEnd + 3);
		return pathStart !== -1 && pathStart < pathnameEnd ? url.slice(pathStart, pathnameEnd) : "/";
	}

	return url.slice(0, pathnameEnd) || "/";
}

/**
 * Normalizes a handler given as a function into a {@link HttpRequestHandler}.
 */
export function toHandler<T extends RequestState>(handler: HandlerLike<T>): HttpRequestHandler<T> {
	return typeof handler === "function" ? { handle: handler } : handler;
}

/**
 * Normalizes a filter given as a function into a {@link HttpRequestFilter}.
 */
export function toFilter<T extends RequestState>(filter: FilterLike<T>): HttpRequestFilter<T> {
	return typeof filter === "function" ? { doFilter: filter } : filter;
}
