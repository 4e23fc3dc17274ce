import express, { type Express } from "express";
import type { Server } from "http";

export interface RecordedRequest {
  method: string;
  url: string;
  switchName?: string;
}

export interface TestServer {
  app: Express;
  // host:port without a scheme
  host: string;
  // normalized server address, e.g. http://127.0.0.1:1234/
  address: string;
  requests: RecordedRequest[];
  close(): Promise<void>;
}

/**
 * Starts an express app on an ephemeral port of 127.0.0.1. Routes are
 * registered by the test on `app` after it starts; every request is recorded.
 */
export function startTestServer(): Promise<TestServer> {
  const app = express();
  const requests: RecordedRequest[] = [];

  app.use((req, _res, next) => {
    requests.push({ method: req.method, url: req.originalUrl });
    next();
  });
  app.param("name", (req, _res, next, name: string) => {
    const last = requests[requests.length - 1];
    if (last) {
      last.switchName = name;
    }
    next();
  });

  return new Promise((resolve, reject) => {
    const server: Server = app.listen(0, "127.0.0.1", () => {
      const info = server.address();
      if (info === null || typeof info === "string") {
        reject(new Error("Test server is not listening on a TCP port"));
        return;
      }
      const host = `127.0.0.1:${info.port}`;
      resolve({
        app,
        host,
        address: `http://${host}/`,
        requests,
        close: () =>
          new Promise<void>((done, fail) =>
            server.close(err => (err ? fail(err) : done()))
          )
      });
    });
    server.on("error", reject);
  });
}
