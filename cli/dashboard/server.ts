/**
 * HTTP server for the dashboard page and its JSON API
 *
 * Routes are keyed "METHOD /pathname" and matched exactly.
 * Binds to loopback; a busy port moves to the next one.
 */
import http from 'http';
import { logError } from '../lib/logger.js';

export type RouteHandler = (req: http.IncomingMessage, res: http.ServerResponse, url: URL) => void | Promise<void>;

export interface DashboardServer {
  start: (callback?: (port: number) => void) => void;
  stop: (callback?: () => void) => void;
  port: number;
  readonly httpServer: http.Server;
}

/**
 * Check a route key ("GET /api/layout") against a request
 */
export function matchRoute(routeKey: string, method: string, pathname: string): boolean {
  return routeKey === `${method} ${pathname}`;
}

export function createServer(
  port: number,
  routes: Record<string, RouteHandler>,
  host = '127.0.0.1'
): DashboardServer {
  const server = http.createServer((req, res) => {
    void (async () => {
      const url = new URL(req.url || '/', `http://localhost:${port}`);
      const method = req.method || 'GET';

      let handler: RouteHandler | undefined;
      for (const [routeKey, h] of Object.entries(routes)) {
        if (matchRoute(routeKey, method, url.pathname)) {
          handler = h;
          break;
        }
      }

      if (!handler) {
        res.writeHead(404, { 'Content-Type': 'text/plain' });
        res.end('Not Found');
        return;
      }

      try {
        await handler(req, res, url);
      } catch (err) {
        logError('Route error', { path: url.pathname, error: err instanceof Error ? err.message : String(err) });
        if (!res.headersSent) {
          res.writeHead(500, { 'Content-Type': 'text/plain' });
        }
        res.end('Internal Server Error');
      }
    })();
  });

  let actualPort = port;

  return {
    start: (callback?: (port: number) => void) => {
      const tryListen = (p: number) => {
        const onListenError = (err: NodeJS.ErrnoException) => {
          if (err.code === 'EADDRINUSE') {
            console.log(`Port ${p} busy, trying ${p + 1}...`);
            tryListen(p + 1);
          } else {
            throw err;
          }
        };
        server.once('error', onListenError);
        server.listen(p, host, () => {
          server.removeListener('error', onListenError);
          const address = server.address();
          actualPort = address !== null && typeof address === 'object' ? address.port : p;
          if (callback) callback(actualPort);
        });
      };
      tryListen(port);
    },
    stop: (callback?: () => void) => {
      server.close(() => {
        if (callback) callback();
      });
      server.closeAllConnections();
    },
    get port() {
      return actualPort;
    },
    httpServer: server
  };
}

// Helper to send HTML response
export function html(res: http.ServerResponse, content: string, status = 200) {
  res.writeHead(status, { 'Content-Type': 'text/html; charset=utf-8' });
  res.end(content);
}

// Helper to send JSON response (no-cache for live updates)
export function json(res: http.ServerResponse, data: unknown, status = 200) {
  res.writeHead(status, {
    'Content-Type': 'application/json',
    'Cache-Control': 'no-store, no-cache, must-revalidate',
    'Pragma': 'no-cache',
    'Expires': '0'
  });
  res.end(JSON.stringify(data));
}

export function redirect(res: http.ServerResponse, location: string) {
  res.writeHead(303, { Location: location });
  res.end();
}
