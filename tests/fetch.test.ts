import { describe, expect, it } from "vitest";
import {
	FilteredHandler,
	PathHandler,
	fromFetchRequest,
	getPathParamAs,
	toFetchHandler,
	toFetchResponse,
	type LogSink,
} from "../packages/core/src";

const silent: LogSink = { log: () => {} };

function createRouter(): PathHandler {
	return new PathHandler({ logger: silent })
		.get("/users/:id:ulong", (request, response) => {
			response.headers.set("Content-Type", "application/json");
			response.body = JSON.stringify({ id: String(getPathParamAs(request, "id", "ulong", 0n)) });
		})
		.head("/users/:id:ulong", (_request, response) => {
			response.body = "ignored!!";
		})
		.delete("/users/:id:ulong", (_request, response) => {
			response.status = 204;
			response.body = "gone";
		})
		.get("/whoami", (request, response) => {
			response.body = request.remoteAddress ?? "unknown";
		})
		.get("/search", (request, response) => {
			response.body = request.url;
		})
		.get("/boom", () => {
			throw new Error("boom");
		});
}

describe("Fetch adapter", () => {
	it("should translate a dispatched response", async () => {
		const fetch = toFetchHandler(createRouter());
		const res = await fetch(new Request("http://localhost/users/34"));

		expect(res.status).toBe(200);
		expect(res.headers.get("Content-Type")).toBe("application/json");
		expect(await res.json()).toEqual({ id: "34" });
	});

	it("should answer unmatched requests with 404", async () => {
		const fetch = toFetchHandler(createRouter());
		const res = await fetch(new Request("http://localhost/users"));

		expect(res.status).toBe(404);
		expect(await res.text()).toBe("");
	});

	it("should keep the query string on the request target", async () => {
		const fetch = toFetchHandler(createRouter());
		const res = await fetch(new Request("http://localhost/search?q=shoes&page=2"));

		expect(await res.text()).toBe("/search?q=shoes&page=2");
	});

	it("should drop the body of HEAD responses", async () => {
		const fetch = toFetchHandler(createRouter());
		const res = await fetch(new Request("http://localhost/users/34", { method: "HEAD" }));

		expect(res.status).toBe(200);
		expect(res.body).toBeNull();
	});

	it("should drop the body of 204 responses", async () => {
		const fetch = toFetchHandler(createRouter());
		const res = await fetch(new Request("http://localhost/users/34", { method: "DELETE" }));

		expect(res.status).toBe(204);
		expect(res.body).toBeNull();
	});

	it("should answer unknown methods with 501 without dispatching", async () => {
		let called = false;
		const fetch = toFetchHandler(() => {
			called = true;
		});
		const res = await fetch(new Request("http://localhost/users/34", { method: "PROPFIND" }));

		expect(res.status).toBe(501);
		expect(called).toBe(false);
	});

	it("should resolve the remote address through the given callback", async () => {
		const fetch = toFetchHandler(createRouter(), { getRemoteAddress: () => "203.0.113.7" });
		const res = await fetch(new Request("http://localhost/whoami"));

		expect(await res.text()).toBe("203.0.113.7");
	});

	it("should reject when the handler throws", async () => {
		const fetch = toFetchHandler(createRouter());
		await expect(fetch(new Request("http://localhost/boom"))).rejects.toThrow("boom");
	});

	it("should serve a filtered handler", async () => {
		const app = new FilteredHandler(
			[
				async (request, response, next) => {
					await next.doFilter(request, response);
					response.headers.set("X-Served-By", "waymark");
				},
			],
			createRouter()
		);
		const res = await toFetchHandler(app)(new Request("http://localhost/users/7"));

		expect(res.headers.get("X-Served-By")).toBe("waymark");
		expect(await res.json()).toEqual({ id: "7" });
	});
});

describe("fromFetchRequest", () => {
	it("should reduce the URL to path and query", () => {
		const request = fromFetchRequest(new Request("https://example.com:8443/a/b?c=d", { headers: { "X-Test": "1" } }), "127.0.0.1");

		expect(request?.method).toBe("GET");
		expect(request?.url).toBe("/a/b?c=d");
		expect(request?.headers.get("X-Test")).toBe("1");
		expect(request?.remoteAddress).toBe("127.0.0.1");
		expect(request?.state).toEqual({});
	});

	it("should return undefined for unknown methods", () => {
		expect(fromFetchRequest(new Request("http://localhost/", { method: "PROPFIND" }))).toBeUndefined();
	});
});

describe("toFetchResponse", () => {
	it("should copy status, headers and body", async () => {
		const headers = new Headers({ "X-Test": "1" });
		const res = toFetchResponse({ status: 201, headers, body: "created" });

		expect(res.status).toBe(201);
		expect(res.headers.get("X-Test")).toBe("1");
		expect(await res.text()).toBe("created");
	});

	it("should omit the body for HEAD", () => {
		const res = toFetchResponse({ status: 200, headers: new Headers(), body: "hidden" }, "HEAD");
		expect(res.body).toBeNull();
	});
});
