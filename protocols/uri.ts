import { UriParseError } from "../errors";
import type { Span, UriSpans } from "../types";

// Generic URI syntax (RFC 3986 section 3) as Gemini uses it: the
// authority is mandatory and there is no userinfo.

const COLON = 0x3a;
const SLASH = 0x2f;
const QUESTION = 0x3f;
const HASH = 0x23;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;
const ZERO = 0x30;
const NINE = 0x39;

const MAX_PORT = 65535;

type State =
  | "scheme"
  | "host"
  | "detectNext"
  | "port"
  | "path"
  | "query"
  | "fragment";

/**
 * A parsed URI. It does not own its bytes: every component is a view into
 * the buffer given to `parseUri`, so the Uri is only valid while that
 * buffer is left untouched.
 */
export class Uri {
  constructor(
    readonly source: Buffer,
    readonly spans: UriSpans,
    readonly port: number | null
  ) {}

  get scheme(): Buffer {
    return view(this.source, this.spans.scheme);
  }

  // for an IP-literal the brackets are not part of the host.
  get host(): Buffer {
    return view(this.source, this.spans.host);
  }

  get path(): Buffer | null {
    return this.spans.path && view(this.source, this.spans.path);
  }

  get query(): Buffer | null {
    return this.spans.query && view(this.source, this.spans.query);
  }

  get fragment(): Buffer | null {
    return this.spans.fragment && view(this.source, this.spans.fragment);
  }

  get isIpLiteral(): boolean {
    return this.source[this.spans.host.start - 1] === OPEN_BRACKET;
  }

  /**
   * The URI rebuilt from its components, byte for byte. Bytes outside
   * ASCII are copied as they are.
   */
  toBuffer(): Buffer {
    const parts: Buffer[] = [this.scheme, Buffer.from("://")];
    if (this.isIpLiteral) {
      parts.push(Buffer.from("["), this.host, Buffer.from("]"));
    } else {
      parts.push(this.host);
    }
    if (this.port !== null) {
      parts.push(Buffer.from(`:${this.port}`));
    }
    if (this.path) {
      parts.push(Buffer.from("/"), this.path);
    }
    if (this.query) {
      parts.push(Buffer.from("?"), this.query);
    }
    if (this.fragment) {
      parts.push(Buffer.from("#"), this.fragment);
    }
    return Buffer.concat(parts);
  }

  // decodes `toBuffer()` as UTF-8, so invalid sequences become U+FFFD.
  toString(): string {
    return this.toBuffer().toString();
  }
}

function view(source: Buffer, span: Span): Buffer {
  return source.subarray(span.start, span.end);
}

function isAlpha(c: number): boolean {
  return (c >= 0x41 && c <= 0x5a) || (c >= 0x61 && c <= 0x7a);
}

function isDigit(c: number): boolean {
  return c >= ZERO && c <= NINE;
}

// ALPHA / DIGIT / "+" / "-" / "."
function isSchemeChar(c: number): boolean {
  return isAlpha(c) || isDigit(c) || c === 0x2b || c === 0x2d || c === 0x2e;
}

// ALPHA / DIGIT / "-" / "." / "_" / "~"
function isUnreserved(c: number): boolean {
  return (
    isAlpha(c) || isDigit(c) || c === 0x2d || c === 0x2e || c === 0x5f || c === 0x7e
  );
}

const SUB_DELIMS = new Set(Buffer.from("!$&'()*+,="));

// *( unreserved / pct-encoded / sub-delims )
function isRegName(c: number): boolean {
  return isUnreserved(c) || c === 0x25 || SUB_DELIMS.has(c);
}

function indexOfAny(input: Buffer, from: number, a: number, b: number): number {
  for (let i = from; i < input.length; i++) {
    if (input[i] === a || input[i] === b) {
      return i;
    }
  }
  return input.length;
}

/**
 * Parses `input` into a Uri. Throws a `UriParseError` on the first byte
 * that does not fit the grammar; no partial result is ever returned.
 */
export function parseUri(input: Buffer): Uri {
  if (input.length === 0) {
    throw new UriParseError("MissingScheme", 0);
  }

  let scheme: Span | null = null;
  let host: Span | null = null;
  let port: number | null = null;
  let path: Span | null = null;
  let query: Span | null = null;
  let fragment: Span | null = null;

  let state: State = "scheme";
  let index = 0;
  let done = false;

  while (!done) {
    switch (state) {
      case "scheme": {
        while (index < input.length && isSchemeChar(input[index])) {
          index++;
        }
        if (index === input.length) {
          throw new UriParseError("MissingScheme", index);
        }
        if (input[index] !== COLON) {
          throw new UriParseError("InvalidCharacter", index);
        }
        if (index === 0) {
          throw new UriParseError("MissingScheme", 0);
        }
        scheme = { start: 0, end: index };
        // "://"
        for (let i = 1; i <= 2; i++) {
          if (input[index + i] !== SLASH) {
            throw new UriParseError("InvalidCharacter", index + i);
          }
        }
        index += 3;
        state = "host";
        break;
      }

      case "host": {
        const start = index;
        if (input[index] === OPEN_BRACKET) {
          const close = input.indexOf(CLOSE_BRACKET, index + 1);
          if (close < 0) {
            throw new UriParseError("MissingClosingBracket", index);
          }
          host = { start: index + 1, end: close };
          index = close + 1;
        } else {
          while (index < input.length && isRegName(input[index])) {
            index++;
          }
          host = { start, end: index };
        }
        if (host.start === host.end) {
          throw new UriParseError("MissingHost", start);
        }
        state = "detectNext";
        break;
      }

      case "detectNext": {
        if (index === input.length) {
          done = true;
          break;
        }
        const c = input[index];
        if (c === COLON) {
          state = "port";
        } else if (c === SLASH) {
          state = "path";
        } else if (c === QUESTION) {
          state = "query";
        } else if (c === HASH) {
          state = "fragment";
        } else {
          throw new UriParseError("InvalidCharacter", index);
        }
        index++;
        break;
      }

      case "port": {
        const start = index;
        let value = 0;
        while (index < input.length && isDigit(input[index])) {
          value = value * 10 + (input[index] - ZERO);
          if (value > MAX_PORT) {
            throw new UriParseError("Overflow", start);
          }
          index++;
        }
        if (index === start) {
          throw new UriParseError("InvalidPort", start);
        }
        port = value;
        state = "detectNext";
        break;
      }

      case "path": {
        const end = indexOfAny(input, index, QUESTION, HASH);
        path = { start: index, end };
        if (end === input.length) {
          done = true;
          break;
        }
        state = input[end] === QUESTION ? "query" : "fragment";
        index = end + 1;
        break;
      }

      case "query": {
        const hash = input.indexOf(HASH, index);
        const end = hash < 0 ? input.length : hash;
        query = { start: index, end };
        if (hash < 0) {
          done = true;
          break;
        }
        state = "fragment";
        index = end + 1;
        break;
      }

      case "fragment": {
        fragment = { start: index, end: input.length };
        done = true;
        break;
      }
    }
  }

  if (scheme === null || host === null) {
    // every path out of the loop passes through both states
    throw new UriParseError("MissingScheme", 0);
  }

  return new Uri(input, { scheme, host, path, query, fragment }, port);
}
