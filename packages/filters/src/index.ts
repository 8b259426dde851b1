export { logger, ConsoleTransport, Levels, Logger, type LoggerOptions } from "./logger";
export { basicAuth, type BasicAuthOptions } from "./basic-auth";
export { cors, type CorsOptions } from "./cors";
