import type { Socket } from "net";

// A promise-based API for TCP sockets.
export type TCPConn = {
  // the JS socket object
  socket: Socket;
  // the callbacks of the promise of the current read
  reader: null | {
    resolve: (value: Buffer) => void;
    reject: (reason: Error) => void;
  };
  // for the error event
  error: null | Error;
  // for EOF from end event
  ended: boolean;
};

export type DynamicBuffer = {
  data: Buffer;
  len: number;
};

// a source of bytes. returns an empty buffer after EOF.
export type ByteReader = {
  read: () => Promise<Buffer>;
};

// a sink for bytes. resolves once the data is handed to the connection.
export type ByteWriter = {
  write: (data: Buffer) => Promise<void>;
};

// a half-open byte range [start, end) into a source buffer.
export type Span = {
  start: number;
  end: number;
};

export type UriSpans = {
  scheme: Span;
  host: Span;
  path: Span | null;
  query: Span | null;
  fragment: Span | null;
};
