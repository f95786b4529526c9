import type * as net from "net";
import type { TCPConn } from "../types";

// create a wrapper from net.Socket
export function soInit(socket: net.Socket): TCPConn {
  const conn: TCPConn = {
    socket: socket,
    reader: null,
    ended: false,
    error: null,
  };

  socket.on("data", (data: Buffer) => {
    const reader = conn.reader;
    console.assert(reader);
    // pause the 'data' event until the next read.
    conn.socket.pause();
    // fulfill the promise of the current read.
    reader?.resolve(data);
    conn.reader = null;
  });

  socket.on("end", () => {
    conn.ended = true;

    if (conn.reader) {
      // EOF
      conn.reader.resolve(Buffer.from(""));
      conn.reader = null;
    }
  });

  socket.on("error", (err) => {
    conn.error = err;

    if (conn.reader) {
      conn.reader.reject(err);
      conn.reader = null;
    }
  });

  // nothing is read until the first soRead.
  socket.pause();

  return conn;
}

export function soRead(conn: TCPConn): Promise<Buffer> {
  console.assert(!conn.reader); // no concurrent calls
  return new Promise((resolve, reject) => {
    // if the connection is not readable, complete the promise now.
    if (conn.error) {
      reject(conn.error);
      return;
    }

    if (conn.ended) {
      resolve(Buffer.from("")); // EOF
      return;
    }

    // save the promise callbacks
    conn.reader = {
      resolve: resolve,
      reject: reject,
    };
    // and resume the 'data' event to fulfill the promise later.
    conn.socket.resume();
  });
}

export function soWrite(conn: TCPConn, data: Buffer): Promise<void> {
  console.assert(data.length > 0);
  return new Promise((resolve, reject) => {
    if (conn.error) {
      reject(conn.error);
      return;
    }

    conn.socket.write(data, (err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}

// half-close after a completed transaction, tear down after a failed one.
export function soClose(conn: TCPConn): void {
  if (conn.error || conn.socket.destroyed) {
    conn.socket.destroy();
    return;
  }
  const socket = conn.socket;
  socket.end(() => socket.destroy());
}
