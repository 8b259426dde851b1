import { randomUUID } from "node:crypto";
import { ConsoleTransport, Levels, Logger } from "@rabbit-company/logger";
import { HttpStatus, getRequestPath, type HttpRequestFilterFunction, type LogSink, type ServerHttpRequest, type ServerHttpResponse } from "@waymark/core";

/**
 * Options for configuring the logger filter.
 */
export interface LoggerOptions {
	/**
	 * Logger to write to. If not provided, a console logger is created.
	 */
	logger?: LogSink;

	/**
	 * Log level for request and response lines.
	 * Default: Levels.HTTP
	 */
	level?: Levels;

	/**
	 * Shorthand for a set of the include* options.
	 * Individual options given alongside a preset take precedence over it.
	 * - "minimal": method, target, status and duration only
	 * - "standard": Adds a request ID
	 * - "detailed": Adds headers, user agent and remote address
	 */
	preset?: "minimal" | "standard" | "detailed";

	/**
	 * Whether to log incoming requests.
	 * Default: true
	 */
	logRequests?: boolean;

	/**
	 * Whether to log completed responses.
	 * Default: true
	 */
	logResponses?: boolean;

	/**
	 * Whether to include the duration in response metadata.
	 * Default: true
	 */
	logDuration?: boolean;

	/**
	 * Whether to generate a request ID, store it in the request state and include it in logs.
	 * Default: false
	 */
	includeRequestId?: boolean;

	/**
	 * Whether request metadata carries the request headers.
	 * Default: false
	 */
	includeHeaders?: boolean;

	/**
	 * Whether to include the user agent.
	 * Default: false
	 */
	includeUserAgent?: boolean;

	/**
	 * Whether to include the remote address.
	 * Default: false
	 */
	includeRemoteAddress?: boolean;

	/**
	 * Headers to leave out of logged headers (case-insensitive).
	 * Default: ["authorization", "cookie", "set-cookie"]
	 */
	excludeHeaders?: string[];

	/**
	 * Paths that are never logged, compared without the query string. Strings match exactly.
	 * Default: ["/health", "/ping"]
	 */
	excludePaths?: (string | RegExp)[];

	/**
	 * Response status codes to leave unlogged.
	 * Default: []
	 */
	excludeStatusCodes?: number[];

	/**
	 * Function to generate a request ID. Defaults to the incoming `x-request-id` or
	 * `x-correlation-id` header, or a random UUID.
	 */
	generateRequestId?: (request: ServerHttpRequest) => string;

	/**
	 * Key in the request state where the request ID is stored.
	 * Default: "requestId"
	 */
	requestIdKey?: string;

	/**
	 * Returns true for requests that should pass through unlogged.
	 */
	skip?: (request: ServerHttpRequest) => boolean | Promise<boolean>;

	/**
	 * Builds the message of the request line.
	 */
	formatRequestMessage?: (request: ServerHttpRequest, requestId: string) => string;

	/**
	 * Builds the message of the response line.
	 */
	formatResponseMessage?: (request: ServerHttpRequest, response: ServerHttpResponse, requestId: string, duration: number) => string;

	/**
	 * Extra metadata merged into every line, or a function computing it per request.
	 */
	metadata?: Record<string, unknown> | ((request: ServerHttpRequest) => Record<string, unknown>);
}

/**
 * HTTP request/response logging filter using @rabbit-company/logger.
 *
 * Writes one line when a request enters the chain and one when the rest of the chain
 * completes. A failure further down is logged at ERROR level and rethrown unchanged.
 *
 * @example
 * ```typescript
 * const app = new FilteredHandler([logger({ preset: "minimal" })], router);
 * // GET - 127.0.0.1 - /api/users - 200 - 45ms
 *
 * const accessLog = new Logger({
 *   level: Levels.INFO,
 *   transports: [new ConsoleTransport()],
 * });
 * const quiet = logger({ logger: accessLog, level: Levels.INFO, excludePaths: ["/health", /^\/static/] });
 * ```
 */
export function logger(options: LoggerOptions = {}): HttpRequestFilterFunction {
	const {
		logger: sink,
		level = Levels.HTTP,
		logRequests = true,
		logResponses = true,
		logDuration = true,
		includeRequestId = false,
		includeHeaders = false,
		includeUserAgent = false,
		includeRemoteAddress = false,
		excludeHeaders = ["authorization", "cookie", "set-cookie"],
		excludePaths = ["/health", "/ping"],
		excludeStatusCodes = [],
		generateRequestId = requestIdFromHeaders,
		requestIdKey = "requestId",
		skip,
		formatRequestMessage = (request) => describeRequest(request),
		formatResponseMessage = (request, response, _requestId, duration) => `${describeRequest(request)} - ${response.status} - ${duration}ms`,
		metadata,
	}: LoggerOptions = { ...PRESETS[options.preset ?? "minimal"], ...options };

	const output: LogSink = sink ?? new Logger({ level, transports: [new ConsoleTransport()] });
	const details: DetailSettings = {
		headers: includeHeaders,
		userAgent: includeUserAgent,
		remoteAddress: includeRemoteAddress,
		hiddenHeaders: new Set(excludeHeaders.map((name) => name.toLowerCase())),
	};

	return async (request, response, next) => {
		if ((skip && (await skip(request))) || isExcluded(getRequestPath(request.url), excludePaths)) {
			return next.doFilter(request, response);
		}

		const requestId = includeRequestId ? generateRequestId(request) : undefined;
		if (requestId) request.state[requestIdKey] = requestId;

		const shared: Record<string, unknown> = { ...resolveMetadata(metadata, request) };
		if (requestId) shared.requestId = requestId;

		if (logRequests) {
			const requestDetails = describeDetails(request, details);
			output.log(level, formatRequestMessage(request, requestId ?? ""), requestDetails ? { ...shared, request: requestDetails } : shared);
		}

		const started = Date.now();
		const timing = (duration: number) => (logDuration ? { duration } : {});

		try {
			await next.doFilter(request, response);
		} catch (error) {
			const duration = Date.now() - started;
			if (logResponses) {
				output.log(Levels.ERROR, `${describeRequest(request)} - failed after ${duration}ms`, {
					...shared,
					...timing(duration),
					statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
					error: serializeError(error),
				});
			}
			throw error;
		}

		const duration = Date.now() - started;
		if (logResponses && !excludeStatusCodes.includes(response.status)) {
			output.log(level, formatResponseMessage(request, response, requestId ?? "", duration), {
				...shared,
				...timing(duration),
				statusCode: response.status,
			});
		}
	};
}

/** What each preset turns on. Options passed alongside a preset win over it. */
const PRESETS: Record<NonNullable<LoggerOptions["preset"]>, LoggerOptions> = {
	minimal: { includeRequestId: false, includeHeaders: false, includeUserAgent: false, includeRemoteAddress: false },
	standard: { includeRequestId: true, includeHeaders: false, includeUserAgent: false, includeRemoteAddress: false },
	detailed: { includeRequestId: true, includeHeaders: true, includeUserAgent: true, includeRemoteAddress: true },
};

interface DetailSettings {
	headers: boolean;
	userAgent: boolean;
	remoteAddress: boolean;
	hiddenHeaders: ReadonlySet<string>;
}

function describeRequest(request: ServerHttpRequest): string {
	return `${request.method} - ${request.remoteAddress ?? "-"} - ${request.url}`;
}

function requestIdFromHeaders(request: ServerHttpRequest): string {
	return request.headers.get("x-request-id") || request.headers.get("x-correlation-id") || randomUUID();
}

function isExcluded(pathname: string, excludePaths: readonly (string | RegExp)[]): boolean {
	return excludePaths.some((path) => (typeof path === "string" ? path === pathname : path.test(pathname)));
}

function resolveMetadata(metadata: LoggerOptions["metadata"], request: ServerHttpRequest): Record<string, unknown> {
	if (typeof metadata === "function") return metadata(request);
	return metadata ?? {};
}

/**
 * Collects the request details enabled in `settings`, or `undefined` when none are.
 */
function describeDetails(request: ServerHttpRequest, settings: DetailSettings): Record<string, unknown> | undefined {
	if (!settings.headers && !settings.userAgent && !settings.remoteAddress) return undefined;

	const details: Record<string, unknown> = { method: request.method, url: request.url };
	if (settings.headers) {
		const visible: Record<string, string> = {};
		request.headers.forEach((value, name) => {
			if (!settings.hiddenHeaders.has(name.toLowerCase())) visible[name] = value;
		});
		details.headers = visible;
	}
	if (settings.userAgent) details.userAgent = request.headers.get("user-agent") ?? undefined;
	if (settings.remoteAddress) details.remoteAddress = request.remoteAddress;
	return details;
}

function serializeError(error: unknown): Record<string, unknown> {
	if (error instanceof Error) {
		return { name: error.name, message: error.message, stack: error.stack };
	}
	return { name: "Unknown", message: String(error), stack: undefined };
}

export { ConsoleTransport, Levels, Logger };
