/**
 * Thrown during setup when the route table or a filter chain is configured with
 * something it cannot work with. Never thrown while dispatching a request.
 */
export class InvalidConfigurationError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = "InvalidConfigurationError";
	}
}

/**
 * Thrown when a path pattern cannot be compiled.
 */
export class InvalidPatternError extends Error {
	constructor(
		public readonly pattern: string,
		reason: string
	) {
		super(`Invalid path pattern "${pattern}": ${reason}`);
		this.name = "InvalidPatternError";
	}
}

/**
 * Raised when an empty filter chain, which has no terminal handler, is asked to handle a request.
 */
export class EmptyFilterChainError extends Error {
	constructor() {
		super("Cannot handle a request with an empty filter chain; it has no terminal handler.");
		this.name = "EmptyFilterChainError";
	}
}

/**
 * Raised when a filter misuses its continuation during a traversal.
 */
export class FilterChainError extends Error {
	constructor(message: string) {
		super(message);
		this.name = "FilterChainError";
	}
}

/**
 * Raised by the strict path parameter accessors when a parameter is missing or does not parse.
 */
export class PathParamError extends Error {
	constructor(
		public readonly paramName: string,
		message: string
	) {
		super(message);
		this.name = "PathParamError";
	}
}
