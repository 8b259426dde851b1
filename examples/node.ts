import { createServer, type IncomingMessage, type ServerResponse } from "node:http";
import { FilteredHandler, HttpStatus, PathHandler, getPathParamAs, toFetchHandler } from "@waymark/core";
import { ConsoleTransport, Levels, Logger, basicAuth, cors, logger } from "@waymark/filters";

/**
 * Serves a small API on http://localhost:3000 with Node's http module.
 *
 *   GET  /users            list users
 *   GET  /users/:id:ulong  one user
 *   POST /users            create a user
 *   GET  /admin/**         protected by basic auth (admin / test-secret)
 */

const log = new Logger({
	level: Levels.DEBUG,
	transports: [new ConsoleTransport()],
});

const users = new Map<bigint, string>([
	[1n, "Alice"],
	[2n, "Bob"],
]);

const admin = new PathHandler({ logger: log }).get("/admin/stats", (request, response) => {
	response.headers.set("Content-Type", "application/json");
	response.body = JSON.stringify({ users: users.size, viewer: request.state.user });
});

const router = new PathHandler({ logger: log })
	.get("/users", (_request, response) => {
		response.headers.set("Content-Type", "application/json");
		response.body = JSON.stringify([...users].map(([id, name]) => ({ id: id.toString(), name })));
	})
	.get("/users/:id:ulong", (request, response) => {
		const name = users.get(getPathParamAs(request, "id", "ulong", 0n));
		if (name === undefined) {
			response.status = HttpStatus.NOT_FOUND;
			return;
		}
		response.headers.set("Content-Type", "application/json");
		response.body = JSON.stringify({ name });
	})
	.post("/users", (_request, response) => {
		const id = BigInt(users.size + 1);
		users.set(id, `User ${id}`);
		response.status = HttpStatus.CREATED;
		response.headers.set("Location", `/users/${id}`);
	})
	.addMapping(
		"/admin/**",
		new FilteredHandler([basicAuth({ validate: (username, password) => username === "admin" && password === "test-secret" })], admin)
	)
	.setNotFoundHandler((request, response) => {
		response.status = HttpStatus.NOT_FOUND;
		response.headers.set("Content-Type", "application/json");
		response.body = JSON.stringify({ error: "Not Found", path: request.url });
	});

const app = new FilteredHandler([logger({ logger: log, preset: "standard" }), cors()], router);

const fetchHandler = toFetchHandler(app, {
	getRemoteAddress: (request) => request.headers.get("x-forwarded-for") ?? undefined,
});

function readBody(req: IncomingMessage): Promise<Buffer> {
	return new Promise((resolve, reject) => {
		const chunks: Buffer[] = [];
		req.on("data", (chunk: Buffer) => chunks.push(chunk));
		req.on("end", () => resolve(Buffer.concat(chunks)));
		req.on("error", reject);
	});
}

async function serve(req: IncomingMessage, res: ServerResponse): Promise<void> {
	const headers = new Headers();
	for (const [name, value] of Object.entries(req.headers)) {
		if (Array.isArray(value)) value.forEach((item) => headers.append(name, item));
		else if (value !== undefined) headers.set(name, value);
	}
	// The socket address is what the client really connected from
	if (req.socket.remoteAddress) headers.set("x-forwarded-for", req.socket.remoteAddress);

	const method = req.method ?? "GET";
	const body = method === "GET" || method === "HEAD" ? undefined : await readBody(req);
	const response = await fetchHandler(new Request(`http://${req.headers.host ?? "localhost"}${req.url ?? "/"}`, { method, headers, body }));

	res.writeHead(response.status, Object.fromEntries(response.headers));
	res.end(Buffer.from(await response.arrayBuffer()));
}

createServer((req, res) => {
	serve(req, res).catch((error: unknown) => {
		log.log(Levels.ERROR, "Request failed", { error: error instanceof Error ? error.message : String(error) });
		if (!res.headersSent) res.writeHead(HttpStatus.INTERNAL_SERVER_ERROR);
		res.end();
	});
}).listen(3000, () => {
	log.log(Levels.INFO, "Listening on http://localhost:3000");
});
