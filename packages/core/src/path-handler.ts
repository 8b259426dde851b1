import { InvalidConfigurationError, InvalidPatternError } from "./errors";
import { HttpStatus, getRequestPath, toHandler } from "./http";
import { Levels, getDefaultLogger, type LogSink } from "./logger";
import { HTTP_METHOD_BITS, methodBit, methodMaskFromAll, methodMaskFromMethods, methodsFromMask } from "./method-mask";
import { compilePathPattern, type CompiledPathPattern } from "./path-matcher";
import type { HandlerLike, HttpMethod, HttpRequestHandler, RequestState, ServerHttpRequest, ServerHttpResponse } from "./types";

/**
 * Internal representation of one mapping: a handler, the methods it accepts as a
 * bitmask, and its patterns in match order.
 */
interface HandlerMapping<T extends RequestState> {
	readonly handler: HttpRequestHandler<T>;
	readonly methodsMask: number;
	readonly patterns: readonly CompiledPathPattern[];
}

/**
 * Options for constructing a {@link PathHandler}.
 */
export interface PathHandlerOptions<T extends RequestState = RequestState> {
	/**
	 * Handler for requests that match no mapping.
	 * Default: sets a 404 status with an empty body.
	 */
	notFoundHandler?: HandlerLike<T>;
	/**
	 * Where dispatch decisions are logged, at DEBUG level.
	 * Default: the shared console logger.
	 */
	logger?: LogSink;
}

/**
 * Public description of a registered mapping, as returned by {@link PathHandler.getMappings}.
 */
export interface MappingInfo {
	methods: HttpMethod[];
	patterns: string[];
}

function defaultNotFound(_request: ServerHttpRequest, response: ServerHttpResponse): void {
	response.status = HttpStatus.NOT_FOUND;
	response.body = null;
}

function compilePatterns(patterns: readonly string[]): CompiledPathPattern[] {
	if (patterns.length === 0) {
		throw new InvalidConfigurationError("A mapping needs at least one path pattern.");
	}
	return patterns.map((pattern) => {
		try {
			return compilePathPattern(pattern);
		} catch (err) {
			if (err instanceof InvalidPatternError) {
				throw new InvalidConfigurationError(err.message, { cause: err });
			}
			throw err;
		}
	});
}

/**
 * A request handler that maps incoming requests to a particular handler based on
 * the request's URL path and HTTP method.
 *
 * Mappings are matched in the order they are added, and each mapping's patterns in
 * the order they are listed. The first match wins: adding a mapping whose patterns
 * overlap an earlier one means the earlier one is always called for those requests.
 * Requests that match nothing go to the not-found handler.
 *
 * Add every mapping before traffic begins. Dispatching only reads the mapping list,
 * so one instance can serve any number of requests at once.
 *
 * @template T - The type of the request-scoped state object
 *
 * @example
 * ```typescript
 * const handler = new PathHandler()
 *   .addMapping("GET", "/users", listUsers)
 *   .addMapping("GET", "/users/:id:ulong", (request, response) => {
 *     const id = getPathParamAs(request, "id", "ulong", 0n);
 *     response.body = `User ${id}`;
 *   })
 *   .addMapping(["PUT", "PATCH"], "/users/:id:ulong", updateUser)
 *   .addMapping("/api/**", apiHandler);
 *
 * const fetchHandler = toFetchHandler(handler);
 * ```
 */
export class PathHandler<T extends RequestState = RequestState> implements HttpRequestHandler<T> {
	/** Every mapping, in match order */
	private readonly mappings: HandlerMapping<T>[] = [];
	/** Handler used when no mapping matches */
	private notFoundHandler: HttpRequestHandler<T>;
	/** Sink for dispatch traces */
	private readonly logger: LogSink;

	/**
	 * Creates a path handler with no mappings.
	 */
	constructor(options: PathHandlerOptions<T> = {}) {
		const { notFoundHandler = defaultNotFound, logger = getDefaultLogger() } = options;
		// Values can arrive untyped from plain JavaScript callers
		if (notFoundHandler === null) {
			throw new InvalidConfigurationError("Cannot set the not-found handler to null or undefined.");
		}
		this.notFoundHandler = toHandler<T>(notFoundHandler);
		this.logger = logger;
		this.handle = this.handle.bind(this);
	}

	/**
	 * Adds a mapping, such that requests matching one of the given methods and one of the
	 * given patterns are handed to `handler`. When no method is given, the mapping
	 * matches every method.
	 *
	 * @param methods - One method or a list of methods to match
	 * @param patterns - One pattern or a list of patterns, tried in order
	 * @param handler - The handler for matching requests
	 * @returns The path handler, for method chaining
	 * @throws {InvalidConfigurationError} If a method is unknown, a list is empty, a pattern is invalid or the handler is missing
	 */
	addMapping(methods: HttpMethod | readonly HttpMethod[], patterns: string | readonly string[], handler: HandlerLike<T>): this;
	addMapping(patterns: string | readonly string[], handler: HandlerLike<T>): this;
	addMapping(
		...args: [HttpMethod | readonly HttpMethod[], string | readonly string[], HandlerLike<T>] | [string | readonly string[], HandlerLike<T>]
	): this {
		if (args.length === 3) {
			const [methods, patterns, handler] = args;
			const methodsMask = typeof methods === "string" ? methodBit(methods) : methodMaskFromMethods(methods);
			return this.appendMapping(methodsMask, typeof patterns === "string" ? [patterns] : patterns, handler);
		}
		const [patterns, handler] = args;
		return this.appendMapping(methodMaskFromAll(), typeof patterns === "string" ? [patterns] : patterns, handler);
	}

	/**
	 * Registers a GET mapping.
	 */
	get(patterns: string | readonly string[], handler: HandlerLike<T>): this {
		return this.addMapping("GET", patterns, handler);
	}

	/**
	 * Registers a HEAD mapping.
	 */
	head(patterns: string | readonly string[], handler: HandlerLike<T>): this {
		return this.addMapping("HEAD", patterns, handler);
	}

	/**
	 * Registers a POST mapping.
	 */
	post(patterns: string | readonly string[], handler: HandlerLike<T>): this {
		return this.addMapping("POST", patterns, handler);
	}

	/**
	 * Registers a PUT mapping.
	 */
	put(patterns: string | readonly string[], handler: HandlerLike<T>): this {
		return this.addMapping("PUT", patterns, handler);
	}

	/**
	 * Registers a DELETE mapping.
	 */
	delete(patterns: string | readonly string[], handler: HandlerLike<T>): this {
		return this.addMapping("DELETE", patterns, handler);
	}

	/**
	 * Registers an OPTIONS mapping.
	 */
	options(patterns: string | readonly string[], handler: HandlerLike<T>): this {
		return this.addMapping("OPTIONS", patterns, handler);
	}

	/**
	 * Registers a PATCH mapping.
	 */
	patch(patterns: string | readonly string[], handler: HandlerLike<T>): this {
		return this.addMapping("PATCH", patterns, handler);
	}

	/**
	 * Registers a mapping for every method.
	 */
	any(patterns: string | readonly string[], handler: HandlerLike<T>): this {
		return this.addMapping(patterns, handler);
	}

	/**
	 * Sets the handler called for requests that match no mapping.
	 *
	 * @returns The path handler, for method chaining
	 * @throws {InvalidConfigurationError} If `handler` is null or undefined
	 *
	 * @example
	 * ```typescript
	 * handler.setNotFoundHandler((request, response) => {
	 *   response.status = HttpStatus.NOT_FOUND;
	 *   response.headers.set("Content-Type", "application/json");
	 *   response.body = JSON.stringify({ error: "Not Found", path: request.url });
	 * });
	 * ```
	 */
	setNotFoundHandler(handler: HandlerLike<T>): this {
		// Values can arrive untyped from plain JavaScript callers
		if (handler === null || handler === undefined) {
			throw new InvalidConfigurationError("Cannot set the not-found handler to null or undefined.");
		}
		this.notFoundHandler = toHandler<T>(handler);
		return this;
	}

	/**
	 * Gets every mapping with the methods and patterns it matches, in match order.
	 */
	getMappings(): MappingInfo[] {
		return this.mappings.map((mapping) => ({
			methods: methodsFromMask(mapping.methodsMask),
			patterns: mapping.patterns.map((compiled) => compiled.pattern),
		}));
	}

	/**
	 * Handles a request by finding the first mapping whose method and pattern match and
	 * letting its handler handle the request. When a mapping matches, the captured path
	 * parameters are attached to the request before the handler runs. When none matches,
	 * the not-found handler takes care of it.
	 */
	async handle(request: ServerHttpRequest<T>, response: ServerHttpResponse): Promise<void> {
		const mappedHandler = this.findMappedHandler(request);
		if (mappedHandler) {
			await mappedHandler.handle(request, response);
		} else {
			await this.notFoundHandler.handle(request, response);
		}
	}

	private appendMapping(methodsMask: number, patterns: readonly string[], handler: HandlerLike<T>): this {
		if (handler === null || handler === undefined) {
			throw new InvalidConfigurationError("A mapping needs a handler.");
		}
		const mapping: HandlerMapping<T> = Object.freeze({
			handler: toHandler<T>(handler),
			methodsMask,
			patterns: Object.freeze(compilePatterns(patterns)),
		});
		this.mappings.push(mapping);
		return this;
	}

	/**
	 * Scans the mappings in order and returns the first handler whose mask and pattern
	 * match, recording the captured parameters on the request.
	 */
	private findMappedHandler(request: ServerHttpRequest<T>): HttpRequestHandler<T> | undefined {
		const methodBitValue = HTTP_METHOD_BITS[request.method];
		const path = getRequestPath(request.url);

		for (const mapping of this.mappings) {
			if ((mapping.methodsMask & methodBitValue) === 0) continue;

			for (const compiled of mapping.patterns) {
				const result = compiled.match(path);
				if (result.matches) {
					this.logger.log(Levels.DEBUG, `Found matching handler for ${request.method} ${path} via pattern "${compiled.pattern}"`, {
						method: request.method,
						path,
						pattern: compiled.pattern,
					});
					request.pathParams = result.params;
					return mapping.handler;
				}
			}
		}

		this.logger.log(Levels.DEBUG, `No handler found for ${request.method} ${path}`, { method: request.method, path });
		return undefined;
	}
}
