export { Server, listenAndServe } from "./server/server";
export type { Handler, ServerState } from "./server/server";
export { parseUri, Uri } from "./protocols/uri";
export { parseRequest, MAX_REQUEST_LEN, MAX_URI_LEN } from "./protocols/request";
export type { Request } from "./protocols/request";
export { Body, Response, MAX_HEADER_SIZE, MAX_META_LEN } from "./protocols/response";
export { Status, isSuccess, isValidStatus, statusCategory, statusName } from "./protocols/status";
export type { KnownStatus, StatusCategory, StatusName } from "./protocols/status";
export {
  DEFAULT_MIME_TYPE,
  MimeType,
  fromExtension,
  fromFileName,
  toExtension,
} from "./protocols/mime";
export { BufferedWriter, readerFromMemory } from "./protocols/utils";
export {
  GeminiError,
  RequestError,
  ServerStateError,
  UriParseError,
  isMalformedRequest,
  isPeerGone,
} from "./errors";
export type { RequestErrorCode, UriErrorCode } from "./errors";
export { createLogger } from "./logging/logger";
export type { LogEntry, LogLevel, Logger } from "./logging/logger";
export { DEFAULT_ADDRESS, DEFAULT_OPTIONS, loadConfig, resolveOptions } from "./config";
export type { Config, ListenAddress, ServerOptions } from "./config";
export type { ByteReader, Span, UriSpans } from "./types";
