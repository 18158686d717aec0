/**
 * Client Session
 *
 * Server-side half of the remote DOM. The browser runtime (see
 * client-runtime.ts) connects over a WebSocket once the page has loaded;
 * from then on the server drives the page through this session:
 *
 *   - runFunction() buffers a script for the browser; flush() ships every
 *     buffered script in one `run` message, so wiring up a whole page
 *     costs one round trip.
 *   - exportCallback() files a handler under a generated token. Scripts
 *     bind DOM events to `window.lightDeck.call(token, args)`, and the
 *     browser sends the token back when the event fires.
 *   - getElementById() asks the browser whether an element exists. This one
 *     does wait for the browser.
 *
 * Protocol: JSON messages with { type, ...payload }
 *   server → client  run | query-element
 *   client → server  attach | callback | element-result
 */

import { EventEmitter } from 'events';
import { z } from 'zod';
import { Logger } from 'pino';
import { getLogger } from '../logger';

// --- Wire messages ---

const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('attach'),
    page: z.string().min(1),
  }),
  z.object({
    type: z.literal('callback'),
    token: z.string().min(1),
    args: z.array(z.number().int()).default([]),
  }),
  z.object({
    type: z.literal('element-result'),
    requestId: z.number().int(),
    exists: z.boolean(),
  }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;

export type ServerMessage =
  | { type: 'run'; scripts: string[] }
  | { type: 'query-element'; requestId: number; elementId: string };

export interface SessionTransport {
  send(message: ServerMessage): void;
}

export interface ElementHandle {
  readonly id: string;
}

export type CallbackHandler = (args: number[]) => unknown;

export interface ClientSessionOptions {
  /** How long getElementById() waits for the browser */
  elementQueryTimeoutMs?: number;
}

export class SessionClosedError extends Error {
  constructor(sessionId: number) {
    super(`Session ${sessionId} is closed`);
    this.name = 'SessionClosedError';
  }
}

export class ElementQueryTimeoutError extends Error {
  constructor(elementId: string, timeoutMs: number) {
    super(`No answer for element ID ${elementId} within ${timeoutMs}ms`);
    this.name = 'ElementQueryTimeoutError';
  }
}

interface PendingQuery {
  elementId: string;
  resolve: (element: ElementHandle | null) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout;
}

export function parseClientMessage(raw: string): ClientMessage | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = clientMessageSchema.safeParse(json);
  return result.success ? result.data : null;
}

let nextSessionId = 1;

/**
 * Events:
 *   'attach' (pageToken: string)   browser announced which page it shows
 *   'close'  ()                    session closed
 */
export class ClientSession extends EventEmitter {
  readonly id = nextSessionId++;

  private readonly transport: SessionTransport;
  private readonly queryTimeoutMs: number;
  private readonly log: Logger;

  private buffer: string[] = [];
  private callbacks = new Map<string, CallbackHandler>();
  private nextCallbackId = 1;
  private pending = new Map<number, PendingQuery>();
  private nextRequestId = 1;
  private dispatchChain: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(transport: SessionTransport, options: ClientSessionOptions = {}) {
    super();
    this.transport = transport;
    this.queryTimeoutMs = options.elementQueryTimeoutMs ?? 5000;
    this.log = getLogger('ClientSession').child({ session: this.id });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get callbackCount(): number {
    return this.callbacks.size;
  }

  /** Buffer a script for the browser; sent on the next flush() */
  runFunction(script: string): void {
    if (this.closed) {
      this.log.debug('Dropping script for closed session');
      return;
    }
    this.buffer.push(script);
  }

  /** Send all buffered scripts in one message */
  flush(): void {
    if (this.closed || this.buffer.length === 0) return;
    const scripts = this.buffer;
    this.buffer = [];
    this.transport.send({ type: 'run', scripts });
  }

  /** Register a handler the browser can invoke; returns its token */
  exportCallback(handler: CallbackHandler): string {
    const token = `cb-${this.nextCallbackId++}`;
    this.callbacks.set(token, handler);
    return token;
  }

  getElementById(elementId: string): Promise<ElementHandle | null> {
    if (this.closed) {
      return Promise.reject(new SessionClosedError(this.id));
    }
    // Scripts buffered so far may create or bind the element
    this.flush();

    const requestId = this.nextRequestId++;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(requestId);
        reject(new ElementQueryTimeoutError(elementId, this.queryTimeoutMs));
      }, this.queryTimeoutMs);
      this.pending.set(requestId, { elementId, resolve, reject, timer });
      this.transport.send({ type: 'query-element', requestId, elementId });
    });
  }

  /** Feed one raw message received from the browser */
  handleMessage(raw: string): void {
    const msg = parseClientMessage(raw);
    if (!msg) {
      this.log.warn({ raw: raw.slice(0, 200) }, 'Ignoring malformed client message');
      return;
    }

    switch (msg.type) {
      case 'attach':
        this.emit('attach', msg.page);
        break;
      case 'callback':
        this.dispatch(msg.token, msg.args);
        break;
      case 'element-result':
        this.resolveQuery(msg.requestId, msg.exists);
        break;
    }
  }

  /** Resolves once every callback received so far has finished */
  idle(): Promise<void> {
    return this.dispatchChain;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const query of this.pending.values()) {
      clearTimeout(query.timer);
      query.reject(new SessionClosedError(this.id));
    }
    this.pending.clear();
    this.callbacks.clear();
    this.buffer = [];
    this.emit('close');
  }

  private dispatch(token: string, args: number[]): void {
    const handler = this.callbacks.get(token);
    if (!handler) {
      this.log.warn({ token }, 'Callback for unknown token');
      return;
    }

    // One handler at a time, in arrival order
    this.dispatchChain = this.dispatchChain.then(async () => {
      try {
        await handler(args);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        this.log.error({ token, error: message }, 'UI callback failed');
      }
      this.flush();
    });
  }

  private resolveQuery(requestId: number, exists: boolean): void {
    const query = this.pending.get(requestId);
    if (!query) {
      this.log.debug({ requestId }, 'Late or unknown element-result');
      return;
    }
    clearTimeout(query.timer);
    this.pending.delete(requestId);
    query.resolve(exists ? { id: query.elementId } : null);
  }
}
