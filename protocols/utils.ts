import { soRead, soWrite } from "../transport/promisify-socket";
import type { ByteReader, ByteWriter, DynamicBuffer, TCPConn } from "../types";

export function bufPop(buf: DynamicBuffer, len: number): void {
  buf.data.copyWithin(0, len, buf.len);
  buf.len -= len;
}

export function bufPush(buf: DynamicBuffer, data: Buffer): void {
  const newLen = buf.len + data.length;
  if (buf.data.length < newLen) {
    let cap = Math.max(buf.data.length, 32);
    while (cap < newLen) {
      cap *= 2;
    }
    const grown = Buffer.alloc(cap);
    buf.data.copy(grown, 0, 0, buf.len);
    buf.data = grown;
  }

  data.copy(buf.data, buf.len);
  buf.len = newLen;
}

export function bufView(buf: DynamicBuffer): Buffer {
  return buf.data.subarray(0, buf.len);
}

export function readerFromConn(conn: TCPConn): ByteReader {
  return {
    read: () => soRead(conn),
  };
}

export function writerFromConn(conn: TCPConn): ByteWriter {
  return {
    write: (data) => soWrite(conn, data),
  };
}

export function readerFromMemory(data: Buffer): ByteReader {
  let done = false;
  return {
    read: async (): Promise<Buffer> => {
      if (done) {
        return Buffer.from(""); // no more data
      } else {
        done = true;
        return data;
      }
    },
  };
}

const WRITER_CAPACITY = 4096;

/**
 * Collects small writes and hands them to the socket in as few `write`
 * calls as possible. Bytes only reach the connection on `flush`, or when
 * the buffer is full.
 */
export class BufferedWriter {
  private readonly buf: DynamicBuffer = {
    data: Buffer.alloc(WRITER_CAPACITY),
    len: 0,
  };
  private written = 0;

  constructor(
    private readonly sink: ByteWriter,
    private readonly capacity: number = WRITER_CAPACITY
  ) {}

  // bytes accepted but not yet handed to the socket.
  get pending(): number {
    return this.buf.len;
  }

  // bytes handed to the socket so far.
  get bytesWritten(): number {
    return this.written;
  }

  async write(data: Buffer | string): Promise<void> {
    const bytes = typeof data === "string" ? Buffer.from(data) : data;
    if (this.buf.len > 0 && this.buf.len + bytes.length > this.capacity) {
      await this.flush();
    }
    bufPush(this.buf, bytes);
    if (this.buf.len >= this.capacity) {
      await this.flush();
    }
  }

  // drops bytes that were never handed to the socket.
  discard(): void {
    bufPop(this.buf, this.buf.len);
  }

  async flush(): Promise<void> {
    if (this.buf.len === 0) {
      return;
    }
    // copy out before clearing, the socket may still be reading it.
    const data = Buffer.from(bufView(this.buf));
    bufPop(this.buf, this.buf.len);
    await this.sink.write(data);
    this.written += data.length;
  }
}
