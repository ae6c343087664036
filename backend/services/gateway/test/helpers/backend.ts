// backend/services/gateway/test/helpers/backend.ts
import http, { type IncomingHttpHeaders, type IncomingMessage, type ServerResponse } from "node:http";

export type SeenRequest = {
  method: string;
  url: string;
  headers: IncomingHttpHeaders;
  body: string;
};

export type BackendHandler = (req: IncomingMessage, res: ServerResponse, body: string) => void;

export type TestBackend = {
  url: string;
  port: number;
  seen: SeenRequest[];
  connections: () => number;
  server: http.Server;
  close: () => Promise<void>;
};

/** Echoes what it received as JSON. */
export const echoHandler: BackendHandler = (req, res, body) => {
  res.writeHead(200, { "content-type": "application/json" });
  res.end(
    JSON.stringify({
      method: req.method,
      url: req.url,
      subject: req.headers["x-authenticated-subject"] ?? null,
      body,
    })
  );
};

function listen(server: http.Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject);
    server.listen(0, "127.0.0.1", () => {
      const addr = server.address();
      if (addr === null || typeof addr === "string") {
        reject(new Error("backend did not bind a TCP port"));
        return;
      }
      resolve(addr.port);
    });
  });
}

function closeServer(server: http.Server): Promise<void> {
  server.closeAllConnections();
  return new Promise((resolve, reject) => {
    server.close((err) => (err ? reject(err) : resolve()));
  });
}

/** In-process backend on an ephemeral port. */
export async function startBackend(handler: BackendHandler = echoHandler): Promise<TestBackend> {
  const seen: SeenRequest[] = [];
  let connections = 0;
  const server = http.createServer((req, res) => {
    const chunks: Buffer[] = [];
    req.on("data", (c: Buffer) => chunks.push(c));
    req.on("end", () => {
      const body = Buffer.concat(chunks).toString("utf8");
      seen.push({ method: req.method ?? "", url: req.url ?? "", headers: req.headers, body });
      handler(req, res, body);
    });
  });
  server.on("connection", () => {
    connections += 1;
  });
  const port = await listen(server);
  return {
    url: `http://127.0.0.1:${port}`,
    port,
    seen,
    connections: () => connections,
    server,
    close: () => closeServer(server),
  };
}

/** A port nothing listens on (bound, then released). */
export async function unusedPort(): Promise<number> {
  const server = http.createServer();
  const port = await listen(server);
  await closeServer(server);
  return port;
}

export type Served = { port: number; close: () => Promise<void> };

/** Serves a request listener (the gateway app) on an ephemeral port. */
export async function serve(listener: http.RequestListener): Promise<Served> {
  const server = http.createServer(listener);
  const port = await listen(server);
  return { port, close: () => closeServer(server) };
}

export type RawResponse = { status: number; headers: IncomingHttpHeaders; body: string };

/** Sends the path exactly as given; supertest would normalize it. */
export function rawRequest(
  port: number,
  opts: { method?: string; path: string; headers?: http.OutgoingHttpHeaders }
): Promise<RawResponse> {
  return new Promise((resolve, reject) => {
    const req = http.request(
      {
        host: "127.0.0.1",
        port,
        method: opts.method ?? "GET",
        path: opts.path,
        headers: opts.headers,
        agent: false,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (c: Buffer) => chunks.push(c));
        res.on("end", () =>
          resolve({
            status: res.statusCode ?? 0,
            headers: res.headers,
            body: Buffer.concat(chunks).toString("utf8"),
          })
        );
        res.on("error", reject);
      }
    );
    req.on("error", reject);
    req.end();
  });
}
