export { HttpStatus, createServerRequest, createServerResponse, getRequestPath, toFilter, toHandler, type ServerRequestInit } from "./http";
export { HTTP_METHODS, HTTP_METHOD_BITS, maskIncludes, methodBit, methodMaskFromAll, methodMaskFromMethods, methodsFromMask, parseHttpMethod } from "./method-mask";
export { compilePathPattern, isPathParamType, matchPath, parseParamValue, type CompiledPathPattern } from "./path-matcher";
export { getPathParam, getPathParamAs, getPathParams, requirePathParamAs } from "./path-params";
export { PathHandler, type MappingInfo, type PathHandlerOptions } from "./path-handler";
export {
	BaseHandlerRequestFilter,
	EmptyFilterChain,
	FilterChainNode,
	FilteredHandler,
	TerminalChainNode,
	buildFilterChain,
	type FilterChain,
} from "./filter-chain";
export { fromFetchRequest, toFetchHandler, toFetchResponse, type FetchHandlerOptions } from "./fetch";
export { EmptyFilterChainError, FilterChainError, InvalidConfigurationError, InvalidPatternError, PathParamError } from "./errors";
export { Levels, Logger, getDefaultLogger, type LogSink } from "./logger";
export type * from "./types";
