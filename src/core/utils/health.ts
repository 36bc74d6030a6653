import http from "node:http";
import { Logger } from "./logger";

/**
 * Plain-text `/healthz` endpoint for container probes
 */
export function startHealthServer(port: number, label = "Health check"): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === "/healthz") {
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end("ok");
    } else {
      res.writeHead(404);
      res.end();
    }
  });
  server.listen(port, () => {
    Logger.info(`${label} endpoint listening on /healthz`, { port });
  });
  return server;
}

/** Runs `cleanup`, closes the server and exits; forces the exit after 5s. */
export function gracefulShutdown(server: http.Server, cleanup: () => Promise<void>): () => void {
  let stopping = false;
  return () => {
    if (stopping) return;
    stopping = true;
    Logger.info("Graceful shutdown initiated");
    setTimeout(() => {
      Logger.warn("Forced exit after 5s");
      process.exit(1);
    }, 5000).unref();
    cleanup()
      .catch((error: unknown) => Logger.error("Cleanup failed", error))
      .finally(() => {
        server.close(() => {
          Logger.info("Health server closed");
          process.exit(0);
        });
      });
  };
}
