import * as http from 'http';

const STOP_TIMEOUT_MS = 2_000;
const DEFAULT_POLL_INTERVAL_MS = 500;
const HTML_HEADERS = { 'Content-Type': 'text/html; charset=utf-8', Connection: 'close' };

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}

const SUCCESS_PAGE = `<!DOCTYPE html>
<html>
<head><title>Authorization Successful</title></head>
<body style="font-family: Arial, sans-serif; margin: 50px; text-align: center;">
  <h1 style="color: #28a745;">✅ Authorization Successful!</h1>
  <p>The bot has been authorized to access your Blogger account.</p>
  <p><strong>You can now close this tab and return to Telegram.</strong></p>
  <p>Send <code>/complete_auth</code> to the bot to finish the setup.</p>
</body>
</html>`;

function errorPage(error: string): string {
  return `<!DOCTYPE html>
<html>
<head><title>Authorization Failed</title></head>
<body style="font-family: Arial, sans-serif; margin: 50px; text-align: center;">
  <h1 style="color: #dc3545;">❌ Authorization Failed</h1>
  <p>Error: ${escapeHtml(error)}</p>
  <p>Please try again with <code>/auth</code>.</p>
</body>
</html>`;
}

/** The part of the listener the publishing client depends on. */
export interface CallbackListener {
  readonly redirectUri: string;
  readonly error: string | undefined;
  start(): Promise<void>;
  waitForCallback(timeoutMs: number, pollIntervalMs?: number, signal?: AbortSignal): Promise<string | null>;
  stop(): Promise<void>;
}

/**
 * Short-lived local HTTP listener that captures the `code` (or `error`) Google
 * appends to the redirect URI.  Whichever arrives first is kept; the listener
 * shuts itself down once that response has been sent.
 *
 * One listener serves one authorization attempt.  Calling `start()` twice
 * without `stop()` in between is not supported.
 */
export class OAuthCallbackServer implements CallbackListener {
  private server?: http.Server;
  private boundPort?: number;
  private capturedCode?: string;
  private capturedError?: string;

  constructor(
    private readonly port: number,
    private readonly host = '0.0.0.0',
  ) {}

  get redirectUri(): string {
    return `http://localhost:${this.boundPort ?? this.port}`;
  }

  get code(): string | undefined {
    return this.capturedCode;
  }

  get error(): string | undefined {
    return this.capturedError;
  }

  get listening(): boolean {
    return this.server?.listening ?? false;
  }

  start(): Promise<void> {
    this.capturedCode = undefined;
    this.capturedError = undefined;
    const server = http.createServer((req, res) => this.handleRequest(req, res));
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once('error', (err) => {
        console.error(`[oauthCallbackServer] Failed to listen on port ${this.port}`, err);
        this.server = undefined;
        reject(err);
      });
      server.listen(this.port, this.host, () => {
        const address = server.address();
        this.boundPort = address != null && typeof address === 'object' ? address.port : this.port;
        console.log(`[oauthCallbackServer] OAuth callback server started on port ${this.boundPort}`);
        resolve();
      });
    });
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse): void {
    const url = new URL(req.url ?? '/', 'http://localhost');
    if (req.method !== 'GET' || !(url.pathname === '/' || url.pathname.startsWith('/oauth'))) {
      res.writeHead(404).end();
      return;
    }

    const code = url.searchParams.get('code');
    const error = url.searchParams.get('error');
    const firstValue = this.capturedCode == null && this.capturedError == null;

    if (code) {
      if (firstValue) this.capturedCode = code;
      res.writeHead(200, HTML_HEADERS).end(SUCCESS_PAGE);
    } else if (error) {
      if (firstValue) this.capturedError = error;
      res.writeHead(400, HTML_HEADERS).end(errorPage(error));
    } else {
      res.writeHead(400, HTML_HEADERS).end(errorPage('No authorization code received'));
      return;
    }

    if (firstValue) {
      res.once('finish', () => {
        this.stop().catch((err) => console.error('[oauthCallbackServer] stop after callback failed', err));
      });
    }
  }

  /**
   * Polls the captured state until a code or an error shows up.  Resolves the
   * code, or `null` on error, timeout or abort.
   */
  async waitForCallback(
    timeoutMs: number,
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
    signal?: AbortSignal,
  ): Promise<string | null> {
    const deadline = Date.now() + timeoutMs;
    for (;;) {
      if (this.capturedCode) return this.capturedCode;
      if (this.capturedError || signal?.aborted) return null;

      const remaining = deadline - Date.now();
      if (remaining <= 0) return null;
      await new Promise((r) => setTimeout(r, Math.min(pollIntervalMs, remaining)));
    }
  }

  /** Releases the port.  Safe to call more than once. */
  async stop(): Promise<void> {
    const server = this.server;
    if (!server) return;
    this.server = undefined;

    let timer: NodeJS.Timeout | undefined;
    const closed = new Promise<void>((resolve) => {
      server.close(() => resolve());
      server.closeAllConnections();
    });
    const timedOut = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        console.warn('[oauthCallbackServer] server did not close in time');
        resolve();
      }, STOP_TIMEOUT_MS);
    });

    await Promise.race([closed, timedOut]);
    clearTimeout(timer);
    console.log('[oauthCallbackServer] OAuth callback server stopped');
  }
}
