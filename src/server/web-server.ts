/**
 * Dashboard Web Server
 *
 * HTTP endpoints:
 *   GET /       build the dashboard page and send it as one document
 *   GET /ping   liveness
 *
 * The WebSocket endpoint (/session) shares the HTTP server. Every connection
 * gets a ClientSession; when the browser announces its page token the page's
 * UI actions run against that session.
 */

import { EventEmitter } from 'events';
import * as http from 'http';
import { RawData, WebSocket, WebSocketServer } from 'ws';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { ClientSession, ServerMessage, SessionTransport } from '../web/client-session';
import { PageAccumulator } from '../web/page';
import { renderPageDocument } from '../web/page-renderer';
import { reloadPage } from '../web/ui-helpers';
import { PendingPages } from './pending-pages';

export const SESSION_PATH = '/session';

export interface DashboardServerDeps {
  /** Fill a fresh accumulator with the dashboard's tiles and actions */
  buildPage: (page: PageAccumulator) => void;
  title: string;
  pendingPageTtlMs: number;
  elementQueryTimeoutMs: number;
}

class WebSocketTransport implements SessionTransport {
  constructor(private readonly ws: WebSocket) {}

  send(message: ServerMessage): void {
    if (this.ws.readyState === WebSocket.OPEN) {
      this.ws.send(JSON.stringify(message));
    }
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

/**
 * Events:
 *   'session-ready' (session: ClientSession)   page actions ran and were flushed
 */
export class DashboardServer extends EventEmitter {
  private server?: http.Server;
  private wss: WebSocketServer | null = null;
  private readonly deps: DashboardServerDeps;
  private readonly pending: PendingPages;
  private readonly sessions = new Set<ClientSession>();
  private readonly log: Logger;

  constructor(deps: DashboardServerDeps) {
    super();
    this.deps = deps;
    this.pending = new PendingPages(deps.pendingPageTtlMs);
    this.log = getLogger('WebServer');
  }

  get sessionCount(): number {
    return this.sessions.size;
  }

  get pendingPageCount(): number {
    return this.pending.size;
  }

  /** Start listening; resolves with the bound port */
  start(port: number, host = '0.0.0.0'): Promise<number> {
    const server = http.createServer((req, res) => {
      this.handleRequest(req, res);
    });
    this.server = server;

    this.wss = new WebSocketServer({ server, path: SESSION_PATH });
    this.wss.on('connection', (ws: WebSocket) => this.handleConnection(ws));
    this.wss.on('error', (err: Error) => {
      this.log.error({ error: err.message }, 'WebSocket server error');
    });

    return new Promise((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        server.on('error', (err: NodeJS.ErrnoException) => {
          this.log.error({ error: err.message }, 'HTTP server error');
        });
        const address = server.address();
        const bound = address && typeof address === 'object' ? address.port : port;
        this.log.info({ port: bound, host }, 'Dashboard server started');
        resolve(bound);
      });
    });
  }

  stop(): Promise<void> {
    for (const session of this.sessions) {
      session.close();
    }
    this.sessions.clear();

    if (this.wss) {
      for (const client of this.wss.clients) {
        client.terminate();
      }
      this.wss.close();
      this.wss = null;
    }

    const server = this.server;
    this.server = undefined;
    if (!server) return Promise.resolve();
    return new Promise((resolve, reject) => {
      server.close(err => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
  }

  private handleRequest(req: http.IncomingMessage, res: http.ServerResponse): void {
    const { method } = req;
    const pathname = (req.url ?? '/').split('?')[0];

    if (method === 'GET' && pathname === '/ping') {
      res.writeHead(200, { 'Content-Type': 'text/plain' });
      res.end('pong');
      return;
    }

    if (method === 'GET' && pathname === '/') {
      let body: string;
      try {
        const page = new PageAccumulator();
        this.deps.buildPage(page);
        const pageToken = this.pending.store(page);
        body = renderPageDocument(page, { title: this.deps.title, pageToken, wsPath: SESSION_PATH });
        this.log.debug({ tiles: page.size.tiles, actions: page.size.actions }, 'Page built');
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.log.error({ error: message }, 'Page build failed');
        res.writeHead(500, { 'Content-Type': 'text/plain' });
        res.end('Page build failed');
        return;
      }
      res.writeHead(200, { 'Content-Type': 'text/html; charset=utf-8' });
      res.end(body);
      return;
    }

    res.writeHead(404);
    res.end();
  }

  private handleConnection(ws: WebSocket): void {
    const session = new ClientSession(new WebSocketTransport(ws), {
      elementQueryTimeoutMs: this.deps.elementQueryTimeoutMs,
    });
    this.sessions.add(session);
    this.log.info({ session: session.id, total: this.sessions.size }, 'Client connected');

    session.once('attach', (pageToken: string) => this.attachPage(session, pageToken));

    ws.on('message', (data: RawData) => session.handleMessage(rawToString(data)));
    // ws follows an error with 'close', which cleans up the session
    ws.on('error', (err: Error) => {
      this.log.warn({ session: session.id, error: err.message }, 'WebSocket client error');
    });
    ws.on('close', () => {
      session.close();
      this.sessions.delete(session);
      this.log.info({ session: session.id, total: this.sessions.size }, 'Client disconnected');
    });
  }

  private attachPage(session: ClientSession, pageToken: string): void {
    const page = this.pending.claim(pageToken);
    if (!page) {
      this.log.info({ session: session.id }, 'Unknown or expired page token, reloading client');
      reloadPage(session);
      session.flush();
      return;
    }

    page.runActions(session).then(
      () => this.emit('session-ready', session),
      (err: unknown) => {
        const message = err instanceof Error ? err.message : String(err);
        this.log.error({ session: session.id, error: message }, 'Page actions failed');
      },
    );
  }
}
