import { HttpStatus, createServerResponse, toHandler } from "./http";
import { parseHttpMethod } from "./method-mask";
import type { HandlerLike, ServerHttpRequest, ServerHttpResponse } from "./types";

/**
 * Options for {@link toFetchHandler}.
 */
export interface FetchHandlerOptions {
	/**
	 * Resolves the remote address for a request, for hosts that expose it
	 * outside the `Request` object (for example from a server's `requestIP`).
	 */
	getRemoteAddress?: (request: Request) => string | undefined;
}

/** Statuses whose responses never carry a body */
const NULL_BODY_STATUSES = new Set<number>([HttpStatus.NO_CONTENT, HttpStatus.RESET_CONTENT, HttpStatus.NOT_MODIFIED]);

/**
 * Converts a web-standard `Request` into a {@link ServerHttpRequest}, or `undefined`
 * when its method is not one the dispatcher knows.
 */
export function fromFetchRequest(request: Request, remoteAddress?: string): ServerHttpRequest | undefined {
	const method = parseHttpMethod(request.method);
	if (!method) return undefined;

	const url = new URL(request.url);
	return {
		method,
		url: url.pathname + url.search,
		headers: request.headers,
		body: request.body,
		remoteAddress,
		state: {},
	};
}

/**
 * Converts a {@link ServerHttpResponse} into a web-standard `Response`.
 */
export function toFetchResponse(response: ServerHttpResponse, method?: string): Response {
	const omitBody = method === "HEAD" || NULL_BODY_STATUSES.has(response.status);
	return new Response(omitBody ? null : response.body, {
		status: response.status,
		headers: response.headers,
	});
}

/**
 * Wraps a handler as a fetch-style function, so it can be mounted on any server that
 * speaks `Request` and `Response` (Node.js adapters, edge runtimes, test harnesses).
 * Requests with an unknown method are answered with 501 without reaching the handler.
 * Errors thrown by the handler reject the returned promise.
 *
 * @example
 * ```typescript
 * const router = new PathHandler().addMapping("GET", "/health", (request, response) => {
 *   response.body = "ok";
 * });
 *
 * const fetch = toFetchHandler(router);
 * const res = await fetch(new Request("http://localhost/health"));
 * await res.text(); // "ok"
 * ```
 */
export function toFetchHandler(handler: HandlerLike, options: FetchHandlerOptions = {}): (request: Request) => Promise<Response> {
	const target = toHandler(handler);
	const { getRemoteAddress } = options;

	return async (request: Request): Promise<Response> => {
		const serverRequest = fromFetchRequest(request, getRemoteAddress?.(request));
		if (!serverRequest) {
			return new Response(null, { status: HttpStatus.NOT_IMPLEMENTED });
		}

		const serverResponse = createServerResponse();
		await target.handle(serverRequest, serverResponse);
		return toFetchResponse(serverResponse, serverRequest.method);
	};
}
