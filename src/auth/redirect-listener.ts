/**
 * Loopback redirect listener for desktop authentication
 * Hosts a transient HTTP endpoint that exists only to catch one browser redirect
 */

import http from 'node:http';
import { createDeferred, type Deferred } from '../lib/deferred.ts';
import { DEFAULT_CALLBACK_PATH, DEFAULT_REDIRECT_HOST, formatLoopbackRedirect, LOOPBACK_BIND_ADDRESS } from '../lib/url-utils.ts';
import { logger as defaultLogger, type Logger } from '../utils/logger.ts';
import { BindError } from './errors.ts';

const DEFAULT_SUCCESS_HTML = `<!DOCTYPE html>
<html>
  <head>
    <meta charset="UTF-8">
    <title>Sign-in complete</title>
  </head>
  <body>
    <h1>Sign-in complete</h1>
    <p>You may close this window and return to the application.</p>
    <script>setTimeout(() => window.close(), 2000);</script>
  </body>
</html>
`;

const DEFAULT_FAILURE_HTML = `<!DOCTYPE html>
<html>
  <head>
    <meta charset="UTF-8">
    <title>Sign-in not completed</title>
  </head>
  <body>
    <h1>Sign-in not completed</h1>
    <p>You may close this window and return to the application.</p>
  </body>
</html>
`;

/** Query parameters of the captured redirect (last value wins) */
export type RedirectParams = Record<string, string>;

export type RedirectOutcome = { type: 'redirect'; params: RedirectParams } | { type: 'timeout' } | { type: 'cancelled' };

export interface RedirectListenerOptions {
  /** Explicit port; omitted or 0 lets the OS pick one */
  port?: number;
  /** Address the socket binds to (defaults to 127.0.0.1) */
  bindAddress?: string;
  /** Host written into the redirect URI (defaults to localhost) */
  redirectHost?: string;
  /** Path the provider redirects to (defaults to /callback) */
  callbackPath?: string;
  /** HTML served after a successful redirect */
  successHtml?: string;
  /** Optional logger for debug output (defaults to singleton logger) */
  logger?: Logger;
}

export interface WaitForRedirectOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

function collectParams(searchParams: URLSearchParams): RedirectParams {
  const params: RedirectParams = {};
  for (const [key, value] of searchParams) {
    params[key] = value;
  }
  return params;
}

/**
 * RedirectListener captures the provider's authorization redirect
 *
 * Only the first GET on the callback path carrying `code` or `error` is authoritative.
 * Later requests on the callback path get an empty 204, other paths a 404.
 *
 * @example
 * const listener = new RedirectListener();
 * await listener.start();
 * openBrowser(buildUrl(listener.getRedirectUri()));
 * try {
 *   const outcome = await listener.waitForRedirect({ timeoutMs: 120000 });
 * } finally {
 *   await listener.stop();
 * }
 */
export class RedirectListener {
  private server: http.Server | undefined;
  private boundPort: number | undefined;
  private captured = false;
  private readonly redirect: Deferred<RedirectParams> = createDeferred();
  private readonly closed: Deferred<void> = createDeferred();
  private readonly requestedPort: number;
  private readonly bindAddress: string;
  private readonly redirectHost: string;
  private readonly callbackPath: string;
  private readonly successHtml: string;
  private readonly logger: Logger;

  constructor(options: RedirectListenerOptions = {}) {
    this.requestedPort = options.port ?? 0;
    this.bindAddress = options.bindAddress ?? LOOPBACK_BIND_ADDRESS;
    this.redirectHost = options.redirectHost ?? DEFAULT_REDIRECT_HOST;
    this.callbackPath = options.callbackPath ?? DEFAULT_CALLBACK_PATH;
    this.successHtml = options.successHtml ?? DEFAULT_SUCCESS_HTML;
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Bind the listener
   * Fails fast with BindError if an explicit port is already in use
   */
  async start(): Promise<void> {
    if (this.server || this.closed.settled) {
      throw new Error('Redirect listener can only be started once');
    }

    const server = http.createServer((req, res) => {
      this.handleRequest(req, res);
    });

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error) => {
        reject(new BindError(this.requestedPort, error));
      };
      server.once('error', onError);
      server.listen(this.requestedPort, this.bindAddress, () => {
        server.off('error', onError);
        resolve();
      });
    });

    server.on('error', (error) => {
      this.logger.warn(`Redirect listener error: ${error.message}`);
    });

    const address = server.address();
    if (!address || typeof address === 'string') {
      await new Promise<void>((resolve) => server.close(() => resolve()));
      throw new BindError(this.requestedPort, new Error('Failed to determine redirect listener port'));
    }

    this.server = server;
    this.boundPort = address.port;
    this.logger.debug(`Redirect listener bound on ${this.bindAddress}:${address.port}, callback path ${this.callbackPath}`);
  }

  /**
   * Handle incoming HTTP requests
   */
  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse): void {
    const url = new URL(req.url || '/', `http://${this.redirectHost}`);

    if (req.method !== 'GET' || url.pathname !== this.callbackPath) {
      res.writeHead(404, { 'Content-Type': 'text/plain', Connection: 'close' });
      res.end('Not Found');
      return;
    }

    const params = collectParams(url.searchParams);
    const hasCode = Object.hasOwn(params, 'code');
    if (!hasCode && !Object.hasOwn(params, 'error')) {
      res.writeHead(400, { 'Content-Type': 'text/plain', Connection: 'close' });
      res.end('Missing authorization code');
      return;
    }

    // Browser retries after the first redirect have no effect
    if (this.captured) {
      res.writeHead(204, { Connection: 'close' });
      res.end();
      return;
    }
    this.captured = true;

    const html = hasCode ? this.successHtml : DEFAULT_FAILURE_HTML;
    res.writeHead(200, {
      'Content-Type': 'text/html; charset=utf-8',
      'Content-Length': Buffer.byteLength(html),
      Connection: 'close',
    });
    // Hand off once the page is flushed so stop() cannot cut the response short
    res.end(html, () => {
      this.redirect.resolve(params);
    });
  }

  /**
   * Wait for the redirect, the timeout, or cancellation - whichever comes first
   * A redirect captured before this call is still delivered.
   */
  async waitForRedirect(options: WaitForRedirectOptions): Promise<RedirectOutcome> {
    if (!this.server) {
      throw new Error('Redirect listener not started - call start() first');
    }
    const { timeoutMs, signal } = options;
    if (signal?.aborted) {
      return { type: 'cancelled' };
    }

    return new Promise<RedirectOutcome>((resolve) => {
      const finish = (outcome: RedirectOutcome) => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        resolve(outcome);
      };
      const onAbort = () => finish({ type: 'cancelled' });
      const timer = setTimeout(() => finish({ type: 'timeout' }), timeoutMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      void this.closed.promise.then(() => finish({ type: 'cancelled' }));
      void this.redirect.promise.then((params) => finish({ type: 'redirect', params }));
    });
  }

  /**
   * Release the port and drop any open connection; safe to call more than once
   */
  async stop(): Promise<void> {
    this.closed.resolve();
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;

    await new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
    this.logger.debug('Redirect listener closed');
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  getPort(): number {
    if (this.boundPort === undefined) {
      throw new Error('Redirect listener not started - call start() first');
    }
    return this.boundPort;
  }

  /**
   * Get the redirect URI for this listener, byte-for-byte as sent to the provider
   */
  getRedirectUri(): string {
    return formatLoopbackRedirect(this.redirectHost, this.getPort(), this.callbackPath);
  }
}
