import { EmptyFilterChainError, FilterChainError, InvalidConfigurationError } from "./errors";
import { toFilter, toHandler } from "./http";
import type {
	FilterContinuation,
	FilterLike,
	HandlerLike,
	HttpRequestFilter,
	HttpRequestHandler,
	RequestState,
	ServerHttpRequest,
	ServerHttpResponse,
} from "./types";

/**
 * A link in a filter chain that applies one filter, handing it the rest of the chain.
 *
 * @template T - The type of the request-scoped state object
 */
export class FilterChainNode<T extends RequestState = RequestState> {
	readonly kind = "filter";

	constructor(
		readonly filter: HttpRequestFilter<T>,
		readonly next: FilterChainNode<T> | TerminalChainNode<T>
	) {
		Object.freeze(this);
	}

	/**
	 * Applies this link's filter. The filter receives a continuation that is fresh for
	 * this traversal and proceeds to the next link when called.
	 */
	async doFilter(request: ServerHttpRequest<T>, response: ServerHttpResponse): Promise<void> {
		await this.filter.doFilter(request, response, new ChainContinuation(this.next));
	}
}

/**
 * The last link of a filter chain. It calls a plain handler and offers no further continuation.
 *
 * @template T - The type of the request-scoped state object
 */
export class TerminalChainNode<T extends RequestState = RequestState> {
	readonly kind = "terminal";

	constructor(readonly handler: HttpRequestHandler<T>) {
		Object.freeze(this);
	}

	async doFilter(request: ServerHttpRequest<T>, response: ServerHttpResponse): Promise<void> {
		await this.handler.handle(request, response);
	}
}

/**
 * The chain built from no filters and no terminal handler. It has nothing to run,
 * so handling a request with it is an error.
 */
export class EmptyFilterChain {
	readonly kind = "empty";

	async doFilter(_request: ServerHttpRequest, _response: ServerHttpResponse): Promise<void> {
		throw new EmptyFilterChainError();
	}
}

/**
 * A singly-linked, immutable series of filters. Built once, then shared by every request.
 *
 * @template T - The type of the request-scoped state object
 */
export type FilterChain<T extends RequestState = RequestState> = FilterChainNode<T> | TerminalChainNode<T> | EmptyFilterChain;

/**
 * Continuation handed to a filter. It belongs to a single traversal and may be
 * called at most once; the chain links it points to are never modified.
 */
class ChainContinuation<T extends RequestState> implements FilterContinuation<T> {
	private invoked = false;

	constructor(private readonly link: FilterChainNode<T> | TerminalChainNode<T>) {}

	async doFilter(request: ServerHttpRequest<T>, response: ServerHttpResponse): Promise<void> {
		if (this.invoked) {
			throw new FilterChainError("A filter called its continuation more than once for the same request.");
		}
		this.invoked = true;
		await this.link.doFilter(request, response);
	}
}

const NO_OP_HANDLER: HttpRequestHandler = Object.freeze({ handle: () => {} });

const EMPTY_CHAIN = Object.freeze(new EmptyFilterChain());

/**
 * Builds a filter chain from an ordered list of filters.
 *
 * When `terminal` is given, the chain ends by calling it once every filter has passed
 * the request on. Otherwise the last filter's continuation simply completes.
 *
 * @param filters - Filters in the order they should run
 * @param terminal - Handler called at the end of the chain
 * @returns The root of the chain, or an {@link EmptyFilterChain} when there is nothing to run
 * @throws {InvalidConfigurationError} If a filter or the terminal handler is null
 *
 * @example
 * ```typescript
 * const chain = buildFilterChain([logger(), basicAuth({ validate })], router);
 * await chain.doFilter(request, response);
 * ```
 */
export function buildFilterChain<T extends RequestState = RequestState>(filters: readonly FilterLike<T>[], terminal?: HandlerLike<T>): FilterChain<T> {
	if (filters.length === 0 && terminal === undefined) {
		return EMPTY_CHAIN;
	}

	// Values can arrive untyped from plain JavaScript callers
	if (terminal === null || filters.some((filter) => filter === null || filter === undefined)) {
		throw new InvalidConfigurationError("A filter chain cannot contain null or undefined filters or handlers.");
	}

	let link: FilterChainNode<T> | TerminalChainNode<T> = new TerminalChainNode<T>(terminal === undefined ? NO_OP_HANDLER : toHandler<T>(terminal));
	for (let i = filters.length - 1; i >= 0; i--) {
		const filter = filters[i];
		if (filter === undefined) continue;
		link = new FilterChainNode(toFilter<T>(filter), link);
	}
	return link;
}

/**
 * A filter that calls a request handler and never continues the chain.
 * Place it last when assembling a chain by hand for {@link FilteredHandler}.
 *
 * @template T - The type of the request-scoped state object
 */
export class BaseHandlerRequestFilter<T extends RequestState = RequestState> implements HttpRequestFilter<T> {
	private readonly handler: HttpRequestHandler<T>;

	constructor(handler: HandlerLike<T>) {
		this.handler = toHandler<T>(handler);
	}

	async doFilter(request: ServerHttpRequest<T>, response: ServerHttpResponse, _next: FilterContinuation<T>): Promise<void> {
		await this.handler.handle(request, response);
	}
}

/**
 * A request handler that runs a filter chain in front of an underlying handler.
 *
 * @template T - The type of the request-scoped state object
 *
 * @example
 * ```typescript
 * const router = new PathHandler().addMapping("GET", "/home", homeHandler);
 *
 * const app = new FilteredHandler([logger({ preset: "minimal" }), cors()], router);
 * export default { fetch: toFetchHandler(app) };
 * ```
 */
export class FilteredHandler<T extends RequestState = RequestState> implements HttpRequestHandler<T> {
	/** The chain this handler runs */
	private readonly filterChain: FilterChainNode<T> | TerminalChainNode<T>;

	/**
	 * Constructs a filtered handler that runs a pre-built chain. A chain built by hand
	 * should usually end with a {@link BaseHandlerRequestFilter} or a terminal handler.
	 *
	 * @throws {InvalidConfigurationError} If the chain is empty
	 */
	constructor(filterChain: FilterChain<T>);
	/**
	 * Constructs a filtered handler that runs `filters` in order, then `baseHandler`
	 * if every filter passed the request on.
	 */
	constructor(filters: readonly FilterLike<T>[], baseHandler: HandlerLike<T>);
	constructor(chainOrFilters: FilterChain<T> | readonly FilterLike<T>[], baseHandler?: HandlerLike<T>) {
		let chain: FilterChain<T>;
		if (isFilterList(chainOrFilters)) {
			// Values can arrive untyped from plain JavaScript callers
			if (baseHandler === undefined || baseHandler === null) {
				throw new InvalidConfigurationError("A filtered handler built from a filter list needs a base handler.");
			}
			chain = buildFilterChain<T>(chainOrFilters, baseHandler);
		} else {
			chain = chainOrFilters;
		}
		if (chain.kind === "empty") {
			throw new InvalidConfigurationError("Cannot build a filtered handler from an empty filter chain.");
		}
		this.filterChain = chain;
		this.handle = this.handle.bind(this);
	}

	/**
	 * Handles a request by running it through the filter chain.
	 */
	async handle(request: ServerHttpRequest<T>, response: ServerHttpResponse): Promise<void> {
		await this.filterChain.doFilter(request, response);
	}
}

function isFilterList<T extends RequestState>(value: FilterChain<T> | readonly FilterLike<T>[]): value is readonly FilterLike<T>[] {
	return Array.isArray(value);
}
