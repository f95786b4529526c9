import { EventEmitter } from "events";
import { createServer } from "net";
import type { AddressInfo, Server as NetServer, Socket } from "net";

import { DEFAULT_OPTIONS, resolveOptions } from "../config";
import type { ListenAddress, ServerOptions } from "../config";
import { isMalformedRequest, isPeerGone, RequestError, ServerStateError } from "../errors";
import { createLogger, errorMeta } from "../logging/logger";
import type { Logger } from "../logging/logger";
import { fromExtension } from "../protocols/mime";
import { MAX_REQUEST_LEN, parseRequest } from "../protocols/request";
import type { Request } from "../protocols/request";
import { Response } from "../protocols/response";
import { Status } from "../protocols/status";
import { BufferedWriter, readerFromConn, writerFromConn } from "../protocols/utils";
import { soClose, soInit } from "../transport/promisify-socket";
import type { ByteReader, TCPConn } from "../types";

/**
 * Application code for one transaction. It may send the response itself;
 * if it returns without doing so, the body it wrote is sent as
 * `text/gemini`.
 */
export type Handler = (response: Response, request: Request) => void | Promise<void>;

export type ServerState = "idle" | "running" | "draining" | "stopped";

type Peer = {
  remoteAddress?: string;
  remotePort?: number;
};

/**
 * Owns one listening socket for its whole life:
 * idle -> running -> draining -> stopped.
 *
 * Emits "listening" with the bound AddressInfo once connections are
 * accepted.
 */
export class Server extends EventEmitter {
  private shouldQuit = false;
  private _state: ServerState = "idle";
  private listener: NetServer | null = null;
  private readonly live = new Set<Promise<void>>();
  private requestStop: () => void = () => {};

  constructor(
    private readonly logger: Logger = createLogger(),
    // where the request line is read from; the socket unless replaced.
    private readonly openReader: (conn: TCPConn) => ByteReader = readerFromConn
  ) {
    super();
  }

  get state(): ServerState {
    return this._state;
  }

  // transactions accepted and not yet finished.
  get activeConnections(): number {
    return this.live.size;
  }

  address(): AddressInfo | null {
    const addr = this.listener?.address();
    return addr && typeof addr === "object" ? addr : null;
  }

  /**
   * Listens on `address` and serves until `shutdown` is called. Resolves
   * once every accepted connection has been answered and closed. Rejects
   * only if the socket cannot be bound.
   */
  async run(
    address: ListenAddress,
    options: Partial<ServerOptions>,
    handler: Handler
  ): Promise<void> {
    if (this._state !== "idle") {
      throw new ServerStateError(`cannot run a server that is ${this._state}`);
    }
    const opts = resolveOptions(options);
    this._state = "running";

    const stopped = new Promise<void>((resolve) => {
      this.requestStop = resolve;
    });

    const listener = createServer({ allowHalfOpen: true });
    // the kernel backlog and Node both turn away connections past the bound.
    listener.maxConnections = opts.maxConnections;
    listener.on("connection", (socket: Socket) => this.accept(socket, handler));
    this.listener = listener;

    try {
      await listen(listener, address, opts.maxConnections);
    } catch (err) {
      this._state = "stopped";
      this.listener = null;
      throw err;
    }

    listener.on("error", (err: Error) => {
      this.logger.error("could not accept connection", errorMeta(err));
    });

    const bound = this.address();
    this.logger.info("listening", { ...bound, maxConnections: opts.maxConnections });
    this.emit("listening", bound);

    if (this.shouldQuit) {
      // shutdown came in while we were still binding.
      this.requestStop();
    }
    await stopped;

    this._state = "draining";
    const closed = new Promise<void>((resolve) => listener.close(() => resolve()));
    this.logger.info("draining", { active: this.live.size });
    while (this.live.size > 0) {
      await Promise.all(this.live);
    }
    await closed;

    this._state = "stopped";
    this.listener = null;
    this.logger.info("stopped");
  }

  // stops accepting; `run` resolves once in-flight transactions finish.
  shutdown(): void {
    if (this.shouldQuit) {
      return;
    }
    this.shouldQuit = true;
    this.requestStop();
  }

  private accept(socket: Socket, handler: Handler): void {
    const peer: Peer = {
      remoteAddress: socket.remoteAddress,
      remotePort: socket.remotePort,
    };
    this.logger.debug("new connection", peer);

    const transaction = this.serve(socket, handler, peer)
      .catch((err: unknown) => {
        if (isPeerGone(err)) {
          this.logger.debug("peer went away", { ...peer, ...errorMeta(err) });
        } else {
          this.logger.error("an error occurred handling request", {
            ...peer,
            ...errorMeta(err),
          });
        }
      })
      .finally(() => {
        this.live.delete(transaction);
      });
    this.live.add(transaction);
  }

  private async serve(socket: Socket, handler: Handler, peer: Peer): Promise<void> {
    const conn = soInit(socket);
    const response = new Response(new BufferedWriter(writerFromConn(conn)));
    const buffer = Buffer.alloc(MAX_REQUEST_LEN);

    try {
      await this.transact(conn, response, buffer, handler, peer);
    } finally {
      soClose(conn);
    }
  }

  private async transact(
    conn: TCPConn,
    response: Response,
    buffer: Buffer,
    handler: Handler,
    peer: Peer
  ): Promise<void> {
    let request: Request;
    try {
      request = await parseRequest(this.openReader(conn), buffer);
    } catch (err) {
      if (isPeerGone(err)) {
        return; // nothing to answer
      }
      if (err instanceof RequestError && err.code === "BufferTooSmall") {
        throw err;
      }
      if (isMalformedRequest(err)) {
        this.logger.info("malformed request", { ...peer, ...errorMeta(err) });
        await response.writeHeader(Status.badRequest, "Malformed request");
        return;
      }
      await this.sendTemporaryFailure(response);
      throw err;
    }

    try {
      await handler(response, request);
    } catch (err) {
      await this.sendTemporaryFailure(response);
      throw err;
    }

    if (response.isFlushed) {
      return;
    }
    try {
      await response.flush(fromExtension(".gmi"));
    } catch (err) {
      // a non-success status or bytes left pending in the writer.
      await this.sendTemporaryFailure(response);
      throw err;
    }
  }

  private async sendTemporaryFailure(response: Response): Promise<void> {
    if (response.isFlushed || response.writer.bytesWritten > 0) {
      return; // part of a response is already out
    }
    response.writer.discard();
    try {
      await response.writeHeader(Status.temporaryFailure, "Unexpected error. Retry later.");
    } catch (err) {
      this.logger.warn("could not send failure response", errorMeta(err));
    }
  }
}

function listen(listener: NetServer, address: ListenAddress, backlog: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error) => reject(err);
    listener.once("error", onError);
    listener.listen({ host: address.host, port: address.port, backlog }, () => {
      listener.off("error", onError);
      resolve();
    });
  });
}

/**
 * Serves `handler` on `address` with the default options until the
 * process exits.
 */
export function listenAndServe(
  address: ListenAddress,
  handler: Handler,
  logger?: Logger
): Promise<void> {
  return new Server(logger).run(address, DEFAULT_OPTIONS, handler);
}
