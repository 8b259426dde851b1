import { beforeEach, describe, expect, it } from "vitest";
import { FilteredHandler, createServerRequest, createServerResponse, type HandlerLike, type HttpRequestFilterFunction, type ServerHttpRequest } from "../../packages/core/src";
import { Levels, logger } from "../../packages/filters/src/logger";

class MockLogger {
	public logs: Array<{ level: number; message: string; metadata?: Record<string, unknown> }> = [];

	log(level: number, message: string, metadata?: Record<string, unknown>): void {
		this.logs.push({ level, message, metadata });
	}

	getLogsByLevel(level: number) {
		return this.logs.filter((log) => log.level === level);
	}
}

const ok: HandlerLike = (_request, response) => {
	response.body = "OK";
};

async function run(filter: HttpRequestFilterFunction, request: ServerHttpRequest, handler: HandlerLike = ok) {
	const response = createServerResponse();
	await new FilteredHandler([filter], handler).handle(request, response);
	return response;
}

describe("Logger Filter", () => {
	let mockLogger: MockLogger;

	beforeEach(() => {
		mockLogger = new MockLogger();
	});

	describe("Basic Functionality", () => {
		it("should log request and response with the standard preset", async () => {
			const request = createServerRequest({ method: "GET", url: "/api/test" });
			await run(logger({ logger: mockLogger, preset: "standard" }), request);

			expect(mockLogger.logs).toHaveLength(2);

			const [requestLog, responseLog] = mockLogger.logs;
			const requestId = request.state.requestId;
			expect(typeof requestId).toBe("string");

			expect(requestLog?.level).toBe(Levels.HTTP);
			expect(requestLog?.message).toBe("GET - - - /api/test");
			expect(requestLog?.metadata).toEqual({ requestId });

			expect(responseLog?.level).toBe(Levels.HTTP);
			expect(responseLog?.message).toMatch(/^GET - - - \/api\/test - 200 - \d+ms$/);
			expect(responseLog?.metadata).toEqual({ requestId, duration: expect.any(Number), statusCode: 200 });
		});

		it("should leave out the request ID with the minimal preset", async () => {
			const request = createServerRequest({ url: "/api/test" });
			await run(logger({ logger: mockLogger, preset: "minimal" }), request);

			expect(request.state.requestId).toBeUndefined();
			expect(mockLogger.logs[0]?.metadata).toEqual({});
			expect(mockLogger.logs[1]?.metadata).toEqual({ duration: expect.any(Number), statusCode: 200 });
		});

		it("should reuse an incoming x-request-id header", async () => {
			const request = createServerRequest({ url: "/api/test", headers: { "X-Request-Id": "req-123" } });
			await run(logger({ logger: mockLogger, includeRequestId: true }), request);

			expect(request.state.requestId).toBe("req-123");
			expect(mockLogger.logs[0]?.metadata).toEqual({ requestId: "req-123" });
		});

		it("should fall back to an x-correlation-id header", async () => {
			const request = createServerRequest({ url: "/api/test", headers: { "X-Correlation-Id": "corr-9" } });
			await run(logger({ logger: mockLogger, includeRequestId: true, requestIdKey: "traceId" }), request);

			expect(request.state.traceId).toBe("corr-9");
		});

		it("should include the remote address in messages", async () => {
			const request = createServerRequest({ method: "POST", url: "/items", remoteAddress: "192.0.2.10" });
			await run(logger({ logger: mockLogger }), request, (_request, response) => {
				response.status = 201;
			});

			expect(mockLogger.logs[0]?.message).toBe("POST - 192.0.2.10 - /items");
			expect(mockLogger.logs[1]?.message).toMatch(/^POST - 192\.0\.2\.10 - \/items - 201 - \d+ms$/);
		});

		it("should use the configured level", async () => {
			await run(logger({ logger: mockLogger, level: Levels.INFO }), createServerRequest({ url: "/api" }));

			expect(mockLogger.getLogsByLevel(Levels.INFO)).toHaveLength(2);
		});
	});

	describe("Filtering", () => {
		it("should skip the default excluded paths", async () => {
			let handled = false;
			await run(logger({ logger: mockLogger }), createServerRequest({ url: "/health" }), () => {
				handled = true;
			});

			expect(handled).toBe(true);
			expect(mockLogger.logs).toHaveLength(0);
		});

		it("should match excluded paths by regular expression without the query string", async () => {
			const filter = logger({ logger: mockLogger, excludePaths: [/^\/static\//] });
			await run(filter, createServerRequest({ url: "/static/app.js?v=3" }));
			await run(filter, createServerRequest({ url: "/health" }));

			expect(mockLogger.logs).toHaveLength(2);
			expect(mockLogger.logs[0]?.message).toBe("GET - - - /health");
		});

		it("should not log responses with excluded status codes", async () => {
			await run(logger({ logger: mockLogger, excludeStatusCodes: [404] }), createServerRequest({ url: "/missing" }), (_request, response) => {
				response.status = 404;
			});

			expect(mockLogger.logs).toHaveLength(1);
			expect(mockLogger.logs[0]?.message).toBe("GET - - - /missing");
		});

		it("should honour logRequests and logResponses", async () => {
			await run(logger({ logger: mockLogger, logRequests: false }), createServerRequest({ url: "/a" }));
			expect(mockLogger.logs).toHaveLength(1);
			expect(mockLogger.logs[0]?.message).toMatch(/^GET - - - \/a - 200 - \d+ms$/);

			mockLogger.logs = [];
			await run(logger({ logger: mockLogger, logResponses: false }), createServerRequest({ url: "/a" }));
			expect(mockLogger.logs).toHaveLength(1);
			expect(mockLogger.logs[0]?.message).toBe("GET - - - /a");
		});

		it("should leave out the duration when logDuration is false", async () => {
			await run(logger({ logger: mockLogger, logDuration: false }), createServerRequest({ url: "/a" }));

			expect(mockLogger.logs[1]?.metadata).toEqual({ statusCode: 200 });
		});

		it("should pass skipped requests through unlogged", async () => {
			const response = await run(
				logger({ logger: mockLogger, skip: (request) => request.headers.get("X-Internal") === "1" }),
				createServerRequest({ url: "/a", headers: { "X-Internal": "1" } })
			);

			expect(response.body).toBe("OK");
			expect(mockLogger.logs).toHaveLength(0);
		});
	});

	describe("Detailed Metadata", () => {
		it("should include headers, user agent and remote address", async () => {
			const request = createServerRequest({
				url: "/api/test",
				remoteAddress: "127.0.0.1",
				headers: { "User-Agent": "test-agent", Authorization: "Basic placeholder", "X-Custom": "v" },
			});
			await run(logger({ logger: mockLogger, preset: "detailed", generateRequestId: () => "req-1" }), request);

			expect(mockLogger.logs[0]?.metadata).toEqual({
				requestId: "req-1",
				request: {
					method: "GET",
					url: "/api/test",
					headers: { "user-agent": "test-agent", "x-custom": "v" },
					userAgent: "test-agent",
					remoteAddress: "127.0.0.1",
				},
			});
		});

		it("should let individual options override the preset", async () => {
			await run(logger({ logger: mockLogger, preset: "detailed", includeRequestId: false, includeHeaders: false }), createServerRequest({ url: "/a" }));

			expect(mockLogger.logs[0]?.metadata).toEqual({
				request: { method: "GET", url: "/a", userAgent: undefined, remoteAddress: undefined },
			});
		});

		it("should add static and computed metadata", async () => {
			await run(logger({ logger: mockLogger, metadata: { service: "orders" } }), createServerRequest({ url: "/a" }));
			await run(logger({ logger: mockLogger, metadata: (request) => ({ path: request.url }) }), createServerRequest({ url: "/b" }));

			expect(mockLogger.logs[0]?.metadata).toEqual({ service: "orders" });
			expect(mockLogger.logs[2]?.metadata).toEqual({ path: "/b" });
		});

		it("should use custom message formatters", async () => {
			await run(
				logger({
					logger: mockLogger,
					formatRequestMessage: (request) => `--> ${request.url}`,
					formatResponseMessage: (request, response) => `<-- ${request.url} ${response.status}`,
				}),
				createServerRequest({ url: "/a" })
			);

			expect(mockLogger.logs.map((log) => log.message)).toEqual(["--> /a", "<-- /a 200"]);
		});
	});

	describe("Errors", () => {
		it("should log downstream failures at error level and rethrow", async () => {
			const failure = new Error("boom");
			await expect(
				run(logger({ logger: mockLogger }), createServerRequest({ url: "/fail" }), () => {
					throw failure;
				})
			).rejects.toBe(failure);

			const errors = mockLogger.getLogsByLevel(Levels.ERROR);
			expect(errors).toHaveLength(1);
			expect(errors[0]?.message).toMatch(/^GET - - - \/fail - failed after \d+ms$/);
			expect(errors[0]?.metadata).toEqual({
				duration: expect.any(Number),
				statusCode: 500,
				error: { name: "Error", message: "boom", stack: failure.stack },
			});
		});
	});
});
