import { describe, expect, it } from "vitest";
import { FilteredHandler, createServerRequest, createServerResponse, type HttpMethod } from "../../packages/core/src";
import { cors, type CorsOptions } from "../../packages/filters/src/cors";

function createApp(options?: CorsOptions) {
	return new FilteredHandler([cors(options)], (_request, response) => {
		response.body = "OK";
	});
}

async function send(app: FilteredHandler, method: HttpMethod, origin?: string) {
	const request = createServerRequest({ method, url: "/", headers: origin ? { Origin: origin } : {} });
	const response = createServerResponse();
	await app.handle(request, response);
	return response;
}

describe("CORS Filter", () => {
	it("should allow any origin by default", async () => {
		const res = await send(createApp(), "GET", "https://app.example.com");

		expect(res.headers.get("Access-Control-Allow-Origin")).toBe("https://app.example.com");
		expect(res.body).toBe("OK");
	});

	it("should answer with a wildcard when no origin is sent", async () => {
		const res = await send(createApp(), "GET");

		expect(res.headers.get("Access-Control-Allow-Origin")).toBe("*");
	});

	it("should answer preflight requests without reaching the handler", async () => {
		const res = await send(createApp(), "OPTIONS", "https://app.example.com");

		expect(res.status).toBe(204);
		expect(res.body).toBeNull();
		expect(res.headers.get("Access-Control-Allow-Methods")).toBe("GET, HEAD, PUT, PATCH, POST, DELETE");
		expect(res.headers.get("Access-Control-Allow-Headers")).toBe("Content-Type, Authorization");
		expect(res.headers.get("Access-Control-Max-Age")).toBe("86400");
	});

	it("should continue after a preflight when configured", async () => {
		const res = await send(createApp({ preflightContinue: true }), "OPTIONS", "https://app.example.com");

		expect(res.status).toBe(200);
		expect(res.body).toBe("OK");
		expect(res.headers.get("Access-Control-Allow-Methods")).toBe("GET, HEAD, PUT, PATCH, POST, DELETE");
	});

	it("should use a custom preflight status", async () => {
		const res = await send(createApp({ optionsSuccessStatus: 200 }), "OPTIONS");

		expect(res.status).toBe(200);
		expect(res.body).toBeNull();
	});

	it("should only allow listed origins", async () => {
		const app = createApp({ origin: ["https://a.example.com", "https://b.example.com"] });

		expect((await send(app, "GET", "https://b.example.com")).headers.get("Access-Control-Allow-Origin")).toBe("https://b.example.com");
		expect((await send(app, "GET", "https://evil.example.com")).headers.get("Access-Control-Allow-Origin")).toBeNull();
	});

	it("should still pass disallowed origins to the handler", async () => {
		const res = await send(createApp({ origin: "https://a.example.com" }), "GET", "https://other.example.com");

		expect(res.headers.get("Access-Control-Allow-Origin")).toBeNull();
		expect(res.body).toBe("OK");
	});

	it("should check origins with a function", async () => {
		const app = createApp({ origin: async (origin) => origin.endsWith(".example.com") });

		expect((await send(app, "GET", "https://shop.example.com")).headers.get("Access-Control-Allow-Origin")).toBe("https://shop.example.com");
		expect((await send(app, "GET", "https://example.org")).headers.get("Access-Control-Allow-Origin")).toBeNull();
	});

	it("should set credentials and exposed headers", async () => {
		const res = await send(createApp({ credentials: true, exposeHeaders: ["X-Total-Count", "X-Page"] }), "GET", "https://app.example.com");

		expect(res.headers.get("Access-Control-Allow-Credentials")).toBe("true");
		expect(res.headers.get("Access-Control-Expose-Headers")).toBe("X-Total-Count, X-Page");
	});

	it("should omit the max age header when it is zero", async () => {
		const res = await send(createApp({ maxAge: 0 }), "OPTIONS");

		expect(res.headers.get("Access-Control-Max-Age")).toBeNull();
	});
});
