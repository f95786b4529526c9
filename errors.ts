export type UriErrorCode =
  | "MissingScheme"
  | "MissingHost"
  | "InvalidCharacter"
  | "MissingClosingBracket"
  | "InvalidPort"
  | "Overflow";

export type RequestErrorCode =
  | "EndOfStream"
  | "MissingUri"
  | "MissingCRLF"
  | "UriTooLong"
  | "BufferTooSmall";

export class GeminiError extends Error {
  code: string;
  constructor(code: string, message?: string) {
    super(message ?? code);
    this.name = "GeminiError";
    this.code = code;
  }
}

export class UriParseError extends GeminiError {
  declare code: UriErrorCode;
  // byte offset in the input where parsing stopped
  index: number;
  constructor(code: UriErrorCode, index: number) {
    super(code, `${code} at byte ${index}`);
    this.name = "UriParseError";
    this.index = index;
  }
}

export class RequestError extends GeminiError {
  declare code: RequestErrorCode;
  constructor(code: RequestErrorCode, message?: string) {
    super(code, message);
    this.name = "RequestError";
  }
}

export class ServerStateError extends GeminiError {
  constructor(message: string) {
    super("InvalidState", message);
    this.name = "ServerStateError";
  }
}

const PEER_GONE_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "EPIPE"]);

function hasErrnoCode(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && typeof Reflect.get(err, "code") === "string";
}

/**
 * True when the peer closed, reset or timed out. Nothing can be sent back
 * in that case and nothing is owed.
 */
export function isPeerGone(err: unknown): boolean {
  if (err instanceof RequestError) {
    return err.code === "EndOfStream";
  }
  return hasErrnoCode(err) && PEER_GONE_CODES.has(err.code ?? "");
}

// the client sent something that is not a Gemini request.
export function isMalformedRequest(err: unknown): boolean {
  if (err instanceof UriParseError) {
    return true;
  }
  return (
    err instanceof RequestError &&
    (err.code === "MissingCRLF" ||
      err.code === "MissingUri" ||
      err.code === "UriTooLong")
  );
}
