/**
 * StubRpcServer - In-process JSON-RPC server for contract tests
 *
 * Listens on an ephemeral localhost port, plain or TLS, and speaks either
 * HTTP framing or NUL-terminated raw framing. Parses requests with its own
 * minimal code so client framing is checked against an independent reader.
 */

import * as net from 'node:net';
import * as tls from 'node:tls';

export type StubFraming = 'http' | 'raw';

/**
 * A request as the stub received it.
 */
export interface ReceivedRequest {
  /** 1-based index of the server-side connection the request arrived on */
  connection: number;
  /** Header block (HTTP only), without the trailing blank line */
  head: string | null;
  /** Content-Length the client declared (HTTP only) */
  declaredLength: number | null;
  /** Exact body bytes received */
  body: Buffer;
  /** Parsed body */
  envelope: { method?: unknown; params?: unknown; id?: unknown; jsonrpc?: unknown };
}

/**
 * What the stub does with a request.
 *
 * - `{ envelope, end }`: reply with the JSON of `envelope`, then end the connection if `end`
 * - `{ raw, end }`: reply with these body bytes verbatim (still framed)
 * - `{ wire, end }`: write these bytes with no framing at all, then end the connection if `end`
 * - `'close'`: end the connection without replying
 * - `'silent'`: do nothing
 */
export type StubReply =
  | { envelope: unknown; end?: boolean }
  | { raw: string | Buffer; end?: boolean }
  | { wire: string | Buffer; end?: boolean }
  | 'close'
  | 'silent';

export type StubHandler = (request: ReceivedRequest) => StubReply;

export interface StubServerOptions {
  framing: StubFraming;
  /** Serve TLS with this key and certificate */
  tls?: { key: string; cert: string };
  handler?: StubHandler;
}

/**
 * Default handler: `{ result: params[0] }`, echoing the request id.
 */
export const echoFirstParam: StubHandler = (request) => ({ envelope: echoEnvelope(request) });

/**
 * Like {@link echoFirstParam}, but ends the connection after each reply, as a
 * server without keep-alive does.
 */
export const echoThenClose: StubHandler = (request) => ({ envelope: echoEnvelope(request), end: true });

function echoEnvelope(request: ReceivedRequest): unknown {
  const params = request.envelope.params;
  const first: unknown = Array.isArray(params) ? params[0] : params;
  return { jsonrpc: '2.0', id: request.envelope.id, result: first ?? null };
}

const SEPARATOR = Buffer.from('\r\n\r\n');

export class StubRpcServer {
  readonly requests: ReceivedRequest[] = [];
  handler: StubHandler;

  private readonly framing: StubFraming;
  private readonly server: net.Server;
  private readonly sockets = new Set<net.Socket>();
  private connectionCount = 0;
  private resumedCount = 0;
  private dropBudget = 0;
  private droppedCount = 0;

  constructor(options: StubServerOptions) {
    this.framing = options.framing;
    this.handler = options.handler ?? echoFirstParam;

    if (options.tls) {
      const server = tls.createServer({ key: options.tls.key, cert: options.tls.cert }, (socket) =>
        this.accept(socket)
      );
      // Raw TCP connection, before the handshake
      server.on('connection', (socket: net.Socket) => {
        this.dropIfRequested(socket);
      });
      server.on('secureConnection', (socket: tls.TLSSocket) => {
        if (socket.isSessionReused()) {
          this.resumedCount++;
        }
      });
      // Handshakes the client aborts are expected in some tests
      server.on('tlsClientError', () => undefined);
      this.server = server;
    } else {
      this.server = net.createServer((socket) => {
        if (!this.dropIfRequested(socket)) {
          this.accept(socket);
        }
      });
    }
  }

  /** Number of connections accepted so far */
  get connections(): number {
    return this.connectionCount;
  }

  /** Number of TLS connections that resumed a session */
  get resumedSessions(): number {
    return this.resumedCount;
  }

  /** Number of connections dropped by {@link dropNextConnections} */
  get droppedConnections(): number {
    return this.droppedCount;
  }

  /**
   * Destroy the next `count` incoming TCP connections as soon as they arrive,
   * before any TLS handshake.
   */
  dropNextConnections(count: number): void {
    this.dropBudget = count;
  }

  /** Start listening on `port`, or an ephemeral one. */
  async start(port = 0): Promise<number> {
    await new Promise<void>((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(port, '127.0.0.1', () => {
        this.server.off('error', reject);
        resolve();
      });
    });
    return this.port;
  }

  get port(): number {
    const address = this.server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Stub server is not listening');
    }
    return address.port;
  }

  /**
   * End every open connection from the server side and wait until each has
   * fully closed. The client has processed the FIN by the time this resolves.
   */
  async closeClients(): Promise<void> {
    const closing = [...this.sockets].map(
      (socket) =>
        new Promise<void>((resolve) => {
          socket.once('close', () => resolve());
          socket.end();
        })
    );
    await Promise.all(closing);
  }

  /** Write bytes to every open connection without being asked. */
  broadcast(data: string | Buffer): void {
    for (const socket of this.sockets) {
      socket.write(data);
    }
  }

  /** Destroy every open connection. */
  destroyClients(): void {
    for (const socket of this.sockets) {
      socket.destroy();
    }
  }

  /** Abort every open connection with a TCP reset. */
  resetClients(): void {
    for (const socket of this.sockets) {
      socket.resetAndDestroy();
    }
  }

  async stop(): Promise<void> {
    this.destroyClients();
    await new Promise<void>((resolve) => {
      this.server.close(() => resolve());
    });
  }

  private dropIfRequested(socket: net.Socket): boolean {
    if (this.dropBudget === 0) {
      return false;
    }
    this.dropBudget--;
    this.droppedCount++;
    socket.destroy();
    return true;
  }

  private accept(socket: net.Socket): void {
    const connection = ++this.connectionCount;
    this.sockets.add(socket);
    socket.on('close', () => this.sockets.delete(socket));
    socket.on('error', () => {
      // Client resets are part of several scenarios
    });

    let buffer: Buffer = Buffer.alloc(0);
    socket.on('data', (chunk: Buffer) => {
      buffer = Buffer.concat([buffer, chunk]);
      for (;;) {
        const parsed = this.framing === 'http' ? takeHttpRequest(buffer) : takeRawRequest(buffer);
        if (!parsed) {
          return;
        }
        buffer = parsed.rest;
        this.handle(socket, { connection, ...parsed.request });
      }
    });
  }

  private handle(socket: net.Socket, partial: Omit<ReceivedRequest, 'envelope'>): void {
    let envelope: ReceivedRequest['envelope'] = {};
    try {
      envelope = JSON.parse(partial.body.toString('utf8')) as ReceivedRequest['envelope'];
    } catch {
      // Left empty; handlers can still inspect the raw body
    }
    const request: ReceivedRequest = { ...partial, envelope };
    this.requests.push(request);

    const reply = this.handler(request);
    if (reply === 'silent') {
      return;
    }
    if (reply === 'close') {
      socket.end();
      return;
    }
    if ('wire' in reply) {
      if (reply.end) {
        socket.end(reply.wire);
      } else {
        socket.write(reply.wire);
      }
      return;
    }
    const body =
      'raw' in reply ? Buffer.from(reply.raw) : Buffer.from(JSON.stringify(reply.envelope), 'utf8');
    if (reply.end) {
      socket.end(this.frame(body));
    } else {
      socket.write(this.frame(body));
    }
  }

  private frame(body: Buffer): Buffer {
    if (this.framing === 'raw') {
      return Buffer.concat([body, Buffer.from([0])]);
    }
    const head =
      'HTTP/1.1 200 OK\r\n' +
      'Content-Type: application/json\r\n' +
      `Content-Length: ${body.length}\r\n\r\n`;
    return Buffer.concat([Buffer.from(head), body]);
  }
}

type Parsed = { request: Omit<ReceivedRequest, 'envelope' | 'connection'>; rest: Buffer };

function takeHttpRequest(buffer: Buffer): Parsed | null {
  const end = buffer.indexOf(SEPARATOR);
  if (end === -1) {
    return null;
  }
  const head = buffer.subarray(0, end).toString('latin1');
  const match = /^Content-Length:\s*(\d+)\s*$/im.exec(head);
  const declaredLength = match?.[1] !== undefined ? Number(match[1]) : 0;
  const bodyStart = end + SEPARATOR.length;
  if (buffer.length < bodyStart + declaredLength) {
    return null;
  }
  return {
    request: {
      head,
      declaredLength,
      body: Buffer.from(buffer.subarray(bodyStart, bodyStart + declaredLength)),
    },
    rest: buffer.subarray(bodyStart + declaredLength),
  };
}

function takeRawRequest(buffer: Buffer): Parsed | null {
  const end = buffer.indexOf(0);
  if (end === -1) {
    return null;
  }
  return {
    request: { head: null, declaredLength: null, body: Buffer.from(buffer.subarray(0, end)) },
    rest: buffer.subarray(end + 1),
  };
}
