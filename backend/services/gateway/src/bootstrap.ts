// backend/services/gateway/src/bootstrap.ts
/**
 * Gateway boot sequence, kept out of index.ts so the exit-code contract is
 * testable in-process.
 *
 * Boot order:
 *   1) env file (ENV_FILE, else ./.env when present)
 *   2) config (fatal ConfigError on bad values)
 *   3) logger
 *   4) app + bind (fatal BindError when the port can't be taken)
 *   5) SIGTERM/SIGINT -> graceful close, exit 0
 *
 * Any startup failure is logged at fatal and exits 1.
 */

import { loadEnvFiles, type EnvTarget } from "@admit/shared/env";
import { initLogger, logger } from "@admit/shared/utils/logger";
import {
  registerShutdown,
  startHttpService,
  type ShutdownSignals,
  type StartedService,
} from "@admit/shared/bootstrap/startHttpService";
import { loadGatewayConfig, SERVICE_NAME } from "./config";
import { createDownstream, createGatewayApp } from "./app";

export type BootstrapOptions = {
  /** Defaults to process.env; env files are merged into it. */
  env?: EnvTarget;
  /** Directory that relative env-file paths resolve against. */
  cwd?: string;
  /** Defaults to process.exit. */
  exit?: (code: number) => void;
  /** Defaults to process. */
  signals?: ShutdownSignals;
};

/** Resolves with the running service, or undefined after exit(1). */
export async function bootstrap(
  opts: BootstrapOptions = {}
): Promise<StartedService | undefined> {
  const env = opts.env ?? process.env;
  const exit = opts.exit ?? ((code: number) => process.exit(code));

  try {
    const envFile = env.ENV_FILE?.trim();
    loadEnvFiles(envFile ? [envFile] : [".env"], {
      target: env,
      allowMissing: !envFile,
      cwd: opts.cwd,
    });

    const config = loadGatewayConfig(env);
    const log = initLogger({ service: SERVICE_NAME, level: config.logLevel });

    if (config.apiKey === undefined) {
      log.warn(
        "API_KEY is not set: admission control is DISABLED (open mode); every request is forwarded"
      );
    }
    if (!config.cors.allowAll && config.cors.origins.length === 0) {
      log.warn("ALLOWED_ORIGINS is empty: no cross-origin reads are permitted");
    }

    const downstream = createDownstream(config, log);
    if (!downstream) {
      log.warn("UPSTREAM_URL is not set: admitted requests end at 404");
    }

    const app = createGatewayApp({ config, log, downstream });
    const started = await startHttpService({
      app,
      port: config.port,
      host: config.host,
      serviceName: SERVICE_NAME,
      log,
    });
    registerShutdown(started, log, { exit, signals: opts.signals });

    log.info(
      {
        env: config.appEnv,
        port: started.boundPort,
        admission: config.apiKey === undefined ? "open" : "api-key",
        apiKeyHeader: config.apiKeyHeader,
        cors: config.cors.allowAll ? "*" : config.cors.origins,
        corsMode: config.corsMode,
        upstream: config.upstreamUrl ?? null,
      },
      "gateway ready"
    );
    return started;
  } catch (err) {
    logger.fatal({ err }, "[gateway] fatal during bootstrap");
    exit(1);
    return undefined;
  }
}
