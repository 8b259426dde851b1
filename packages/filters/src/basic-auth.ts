import { HttpStatus, type HttpRequestFilterFunction, type ServerHttpRequest, type ServerHttpResponse } from "@waymark/core";

/**
 * Options for configuring the Basic Authentication filter.
 */
export interface BasicAuthOptions {
	/**
	 * Function to validate the username and password.
	 *
	 * @param username - The provided username from the Authorization header.
	 * @param password - The provided password from the Authorization header.
	 * @param request - The request being authenticated.
	 * @returns A boolean or Promise<boolean> indicating if the credentials are valid.
	 */
	validate: (username: string, password: string, request: ServerHttpRequest) => boolean | Promise<boolean>;

	/**
	 * The authentication realm presented to the user.
	 * Default: "Restricted"
	 */
	realm?: string;

	/**
	 * The key in the request state where authenticated user information is stored.
	 * Default: "user"
	 */
	contextKey?: string;

	/**
	 * Whether to skip basic authentication for specific requests.
	 * Function receives the request and returns true to skip the authentication.
	 */
	skip?: (request: ServerHttpRequest) => boolean | Promise<boolean>;
}

/**
 * Basic Authentication filter for HTTP Basic Auth.
 *
 * Stores `{ username }` in the request state on successful authentication and
 * continues the chain. Otherwise it ends the chain with 401, or with 400 when the
 * header cannot be decoded.
 *
 * @example
 * ```typescript
 * const admin = new FilteredHandler(
 *   [basicAuth({ validate: (username, password) => username === "admin" && password === "test-secret" })],
 *   adminRouter
 * );
 * ```
 */
export function basicAuth(options: BasicAuthOptions): HttpRequestFilterFunction {
	const { skip, validate, realm = "Restricted", contextKey = "user" } = options;

	return async (request, response, next) => {
		if (skip && (await skip(request))) {
			return next.doFilter(request, response);
		}

		const auth = request.headers.get("Authorization");
		if (!auth || !auth.startsWith("Basic ")) {
			return unauthorized(response, realm);
		}

		const credentials = decodeCredentials(auth.slice(6));
		if (!credentials) {
			setText(response, HttpStatus.BAD_REQUEST, "Invalid credentials");
			return;
		}

		const isValid = await validate(credentials.username, credentials.password, request);
		if (!isValid) {
			return unauthorized(response, realm);
		}

		request.state[contextKey] = { username: credentials.username };
		return next.doFilter(request, response);
	};
}

/**
 * Decodes `base64(username:password)`. The password may itself contain colons.
 */
function decodeCredentials(encoded: string): { username: string; password: string } | undefined {
	let decoded: string;
	try {
		decoded = atob(encoded);
	} catch {
		return undefined;
	}

	const separator = decoded.indexOf(":");
	if (separator === -1) return undefined;
	return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

function unauthorized(response: ServerHttpResponse, realm: string): void {
	response.headers.set("WWW-Authenticate", `Basic realm="${realm}"`);
	setText(response, HttpStatus.UNAUTHORIZED, "Unauthorized");
}

function setText(response: ServerHttpResponse, status: number, body: string): void {
	response.status = status;
	response.headers.set("Content-Type", "text/plain");
	response.body = body;
}
