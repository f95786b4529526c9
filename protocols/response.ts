import assert from "assert";

import type { DynamicBuffer } from "../types";
import { MimeType } from "./mime";
import { isSuccess, isValidStatus, Status } from "./status";
import { BufferedWriter, bufPush, bufView } from "./utils";

export const MAX_META_LEN = 1024;
// <STATUS><SPACE><META><CR><LF>
export const MAX_HEADER_SIZE = 2 + 1 + MAX_META_LEN + 2;

// the response body, collected in memory and sent in one go by `flush`.
export class Body {
  private readonly buf: DynamicBuffer = { data: Buffer.alloc(0), len: 0 };

  get length(): number {
    return this.buf.len;
  }

  write(data: Buffer | string): void {
    bufPush(this.buf, typeof data === "string" ? Buffer.from(data) : data);
  }

  bytes(): Buffer {
    return bufView(this.buf);
  }
}

/**
 * The response to a single request. Exactly one of `writeHeader` or
 * `flush` may complete, once; calling either again is a bug in the
 * handler and fails an assertion.
 */
export class Response {
  status: number = Status.success;
  readonly body = new Body();
  /**
   * Set once a complete response reached the socket. Setting it by hand
   * tells the server the handler sent its own response through `writer`.
   */
  isFlushed = false;

  constructor(readonly writer: BufferedWriter) {}

  // header-only response, for every status except success.
  async writeHeader(status: number, meta: string): Promise<void> {
    assert.ok(!this.isFlushed, "response already sent");
    assert.ok(isValidStatus(status), `invalid status code: ${status}`);
    assert.ok(!isSuccess(status), "a success response needs a body, use flush");
    const header = encodeHeader(status, meta);
    assert.ok(this.writer.pending === 0, "writer has unflushed bytes");

    await this.writer.write(header);
    await this.writer.flush();
    this.isFlushed = true;
  }

  // sends the success header with `mimeType` as META, then the body.
  async flush(mimeType: MimeType | string): Promise<void> {
    assert.ok(!this.isFlushed, "response already sent");
    assert.ok(this.writer.pending === 0, "writer has unflushed bytes");
    assert.ok(isSuccess(this.status), "only a success response has a body");

    await this.writer.write(encodeHeader(this.status, mimeType.toString()));
    if (this.body.length > 0) {
      await this.writer.write(this.body.bytes());
    }
    await this.writer.flush();
    this.isFlushed = true;
  }

  input(prompt: string, sensitive = false): Promise<void> {
    return this.writeHeader(
      sensitive ? Status.sensitiveInput : Status.input,
      prompt
    );
  }

  redirect(target: string, permanent = false): Promise<void> {
    return this.writeHeader(
      permanent ? Status.redirectPermanent : Status.redirectTemporary,
      target
    );
  }

  notFound(meta = "Not found"): Promise<void> {
    return this.writeHeader(Status.notFound, meta);
  }

  slowDown(seconds: number): Promise<void> {
    assert.ok(Number.isInteger(seconds) && seconds >= 0, "seconds must be a whole number");
    return this.writeHeader(Status.slowDown, String(seconds));
  }
}

export function encodeHeader(status: number, meta: string): Buffer {
  assert.ok(
    Buffer.byteLength(meta) <= MAX_META_LEN,
    `META is longer than ${MAX_META_LEN} bytes`
  );
  assert.ok(!/[\r\n]/.test(meta), "META must not contain CR or LF");
  return Buffer.from(`${status} ${meta}\r\n`);
}
