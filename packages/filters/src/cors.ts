import { HttpStatus, type HttpRequestFilterFunction } from "@waymark/core";

/**
 * Options for {@link cors}.
 */
export interface CorsOptions {
	/**
	 * Which request origins get an `Access-Control-Allow-Origin` header: `"*"` for any,
	 * one exact origin, a list of exact origins, or a predicate.
	 * Default: "*"
	 */
	origin?: string | string[] | ((origin: string) => boolean | Promise<boolean>);

	/**
	 * Sent as `Access-Control-Allow-Methods` on preflight answers.
	 * Default: ["GET", "HEAD", "PUT", "PATCH", "POST", "DELETE"]
	 */
	allowMethods?: string[];

	/**
	 * Sent as `Access-Control-Allow-Headers` on preflight answers.
	 * Default: ["Content-Type", "Authorization"]
	 */
	allowHeaders?: string[];

	/**
	 * Response headers that browser scripts may read, sent as `Access-Control-Expose-Headers`.
	 */
	exposeHeaders?: string[];

	/**
	 * Sends `Access-Control-Allow-Credentials: true` to allowed origins.
	 * Default: false
	 */
	credentials?: boolean;

	/**
	 * Seconds a browser may reuse a preflight answer. Zero leaves the header out.
	 * Default: 86400
	 */
	maxAge?: number;

	/**
	 * Runs the rest of the chain after setting preflight headers instead of answering
	 * the `OPTIONS` request here.
	 * Default: false
	 */
	preflightContinue?: boolean;

	/**
	 * Status of preflight answers produced by the filter.
	 * Default: 204
	 */
	optionsSuccessStatus?: number;
}

const defaults = {
	origin: "*",
	allowMethods: ["GET", "HEAD", "PUT", "PATCH", "POST", "DELETE"],
	allowHeaders: ["Content-Type", "Authorization"],
	credentials: false,
	maxAge: 86400,
	preflightContinue: false,
	optionsSuccessStatus: HttpStatus.NO_CONTENT,
} satisfies CorsOptions;

/**
 * Cross-Origin Resource Sharing filter.
 *
 * Every request from an allowed origin gets the allow-origin headers. Preflight
 * (`OPTIONS`) requests are answered by the filter and never reach the rest of the
 * chain, unless `preflightContinue` is set.
 *
 * @example
 * ```typescript
 * const app = new FilteredHandler([cors({ origin: ["https://app.example.com"], credentials: true })], router);
 * ```
 */
export function cors(options: CorsOptions = {}): HttpRequestFilterFunction {
	const { origin, allowMethods, allowHeaders, exposeHeaders, credentials, maxAge, preflightContinue, optionsSuccessStatus } = {
		...defaults,
		...options,
	};

	const isAllowed = originMatcher(origin);
	const preflightHeaders: [string, string][] = [];
	if (allowMethods.length) preflightHeaders.push(["Access-Control-Allow-Methods", allowMethods.join(", ")]);
	if (allowHeaders.length) preflightHeaders.push(["Access-Control-Allow-Headers", allowHeaders.join(", ")]);
	if (maxAge) preflightHeaders.push(["Access-Control-Max-Age", String(maxAge)]);

	return async (request, response, next) => {
		const requestOrigin = request.headers.get("Origin") ?? "";

		if (await isAllowed(requestOrigin)) {
			response.headers.set("Access-Control-Allow-Origin", requestOrigin || "*");
			if (credentials) response.headers.set("Access-Control-Allow-Credentials", "true");
			if (exposeHeaders?.length) response.headers.set("Access-Control-Expose-Headers", exposeHeaders.join(", "));
		}

		if (request.method !== "OPTIONS") {
			return next.doFilter(request, response);
		}

		for (const [name, value] of preflightHeaders) {
			response.headers.set(name, value);
		}
		if (preflightContinue) {
			return next.doFilter(request, response);
		}
		response.status = optionsSuccessStatus;
		response.body = null;
	};
}

function originMatcher(allowed: CorsOptions["origin"]): (origin: string) => boolean | Promise<boolean> {
	if (!allowed || allowed === "*") return () => true;
	if (typeof allowed === "string") return (origin) => origin === allowed;
	if (Array.isArray(allowed)) return (origin) => allowed.includes(origin);
	return allowed;
}
