import { RequestError } from "../errors";
import type { ByteReader } from "../types";
import { parseUri, Uri } from "./uri";

const CR = 0x0d;
const LF = 0x0a;

// the URI itself, not counting the CRLF.
export const MAX_URI_LEN = 1024;
export const MAX_REQUEST_LEN = MAX_URI_LEN + 2;

export type Request = {
  readonly uri: Uri;
};

/**
 * Reads one CRLF-terminated request line from `reader` into `buffer` and
 * parses it. The returned Request borrows `buffer`, so the caller must not
 * reuse it until the transaction is over.
 */
export async function parseRequest(
  reader: ByteReader,
  buffer: Buffer
): Promise<Request> {
  if (buffer.length < MAX_REQUEST_LEN) {
    throw new RequestError(
      "BufferTooSmall",
      `request buffer must hold at least ${MAX_REQUEST_LEN} bytes`
    );
  }

  const len = await readLine(reader, buffer);
  if (len === 0) {
    throw new RequestError("EndOfStream");
  }
  if (len === 2 && buffer[0] === CR && buffer[1] === LF) {
    throw new RequestError("MissingUri");
  }
  if (len < 2 || buffer[len - 2] !== CR || buffer[len - 1] !== LF) {
    throw new RequestError("MissingCRLF");
  }

  return { uri: parseUri(buffer.subarray(0, len - 2)) };
}

// reads up to and including the first LF. returns the number of bytes kept.
async function readLine(reader: ByteReader, buffer: Buffer): Promise<number> {
  let len = 0;
  while (true) {
    const data = await reader.read();
    if (data.length === 0) {
      return len; // EOF
    }

    const lf = data.indexOf(LF);
    const take = lf < 0 ? data.length : lf + 1;
    if (len + take > MAX_REQUEST_LEN) {
      throw new RequestError("UriTooLong");
    }
    data.copy(buffer, len, 0, take);
    len += take;

    if (lf >= 0) {
      // anything after the line is not part of the request.
      return len;
    }
  }
}
