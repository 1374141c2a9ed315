// backend/services/shared/src/bootstrap/startHttpService.ts

/**
 * Why:
 * - Starting/stopping an HTTP server is a **single concern**: bind, harden
 *   socket timeouts, log where it landed (port 0 in tests), and shut down cleanly.
 * - Higher-level bootstraps (env load, logger init, app assembly) call this;
 *   this file never loads envs.
 *
 * Notes:
 * - Resolves only once the socket is listening; a listen failure rejects with
 *   BindError so the entrypoint can exit non-zero.
 * - Signal handling is opt-in via registerShutdown(); tests hand it their own
 *   signal emitter and exit function.
 * - headersTimeout must stay > keepAliveTimeout.
 */

import http from "node:http";
import type { RequestListener } from "node:http";
import type { Logger } from "pino";
import { BindError } from "../errors";

export interface StartHttpServiceOptions {
  app: RequestListener;
  /** Allow 0 in tests to get an ephemeral port. */
  port: number;
  host?: string;
  /** Service identity for logs (e.g., "gateway"). */
  serviceName: string;
  log: Logger;
}

export interface StartedService {
  server: http.Server;
  boundPort: number;
  stop: () => Promise<void>;
}

export function startHttpService(
  opts: StartHttpServiceOptions
): Promise<StartedService> {
  const { app, port, host, serviceName, log } = opts;
  const server = http.createServer(app);

  server.keepAliveTimeout = 7_000;
  server.headersTimeout = 9_000;

  const stop = () =>
    new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeIdleConnections();
    });

  return new Promise<StartedService>((resolve, reject) => {
    const onStartupError = (err: NodeJS.ErrnoException) => {
      reject(new BindError(port, err));
    };

    server.once("error", onStartupError);
    server.listen({ port, host }, () => {
      server.off("error", onStartupError);
      server.on("error", (err) => {
        log.error({ err, service: serviceName }, "http server error");
      });

      const addr = server.address();
      const boundPort = addr && typeof addr === "object" ? addr.port : port;
      log.info(
        { service: serviceName, host: host ?? "::", port: boundPort },
        "service listening"
      );
      resolve({ server, boundPort, stop });
    });
  });
}

export type ShutdownSignals = {
  once(
    signal: NodeJS.Signals,
    listener: (signal: NodeJS.Signals) => void
  ): unknown;
};

export interface ShutdownOptions {
  graceMs?: number;
  /** Defaults to process.exit. */
  exit?: (code: number) => void;
  /** Defaults to process. */
  signals?: ShutdownSignals;
}

/**
 * SIGTERM/SIGINT: close the server and exit 0. A fail-safe timer exits 1
 * if close hangs. Uses `once` so repeated signals don't stack handlers.
 */
export function registerShutdown(
  started: StartedService,
  log: Logger,
  opts: ShutdownOptions = {}
): void {
  const graceMs = opts.graceMs ?? 10_000;
  const exit = opts.exit ?? ((code: number) => process.exit(code));
  const signals = opts.signals ?? process;

  const shutdown = (signal: NodeJS.Signals) => {
    log.info({ signal }, "shutting down service");
    const failSafe = setTimeout(() => exit(1), graceMs);
    failSafe.unref();
    started.stop().then(
      () => {
        clearTimeout(failSafe);
        exit(0);
      },
      (err: unknown) => {
        clearTimeout(failSafe);
        log.error({ err }, "error while closing http server");
        exit(1);
      }
    );
  };

  signals.once("SIGTERM", shutdown);
  signals.once("SIGINT", shutdown);
}
