import http from 'http';
import type { Express } from 'express';
import { componentLogger, type Logger } from './logger.js';

export type StopHook = () => Promise<void> | void;

export interface ServerOptions {
  host: string;
  port: number;
  /** How long in-flight requests get to finish before connections are cut. */
  shutdownTimeoutMs: number;
  /** Run in order after the listener has closed. */
  onStop?: StopHook[];
  logger?: Logger;
}

export interface RunningServer {
  server: http.Server;
  port: number;
  shutdown(reason?: string): Promise<void>;
}

export async function startServer(app: Express, opts: ServerOptions): Promise<RunningServer> {
  const log = opts.logger ?? componentLogger('server');
  const server = http.createServer(app);
  await new Promise<void>((resolve, reject) => {
    server.once('error', reject);
    server.listen(opts.port, opts.host, () => {
      server.off('error', reject);
      resolve();
    });
  });
  const address = server.address();
  const port = address !== null && typeof address === 'object' ? address.port : opts.port;
  log.info({ host: opts.host, port }, 'api listening');

  let closing: Promise<void> | undefined;
  const shutdown = (reason = 'shutdown requested'): Promise<void> => {
    if (!closing) closing = drain(server, opts, log, reason);
    return closing;
  };
  return { server, port, shutdown };
}

async function drain(server: http.Server, opts: ServerOptions, log: Logger, reason: string): Promise<void> {
  log.info({ reason }, 'shutting down');
  const closed = new Promise<void>((resolve) => {
    server.close((err) => {
      if (err) log.warn({ err }, 'listener close reported an error');
      resolve();
    });
  });
  server.closeIdleConnections();
  const deadline = setTimeout(() => {
    log.warn({ timeoutMs: opts.shutdownTimeoutMs }, 'shutdown deadline reached, closing remaining connections');
    server.closeAllConnections();
  }, opts.shutdownTimeoutMs);
  deadline.unref();
  await closed;
  clearTimeout(deadline);
  for (const hook of opts.onStop ?? []) {
    try {
      await hook();
    } catch (err) {
      log.error({ err }, 'shutdown hook failed');
    }
  }
  log.info('shutdown complete');
}
