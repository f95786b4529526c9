/**
 * Gemini status codes. The wire value is the number itself.
 *
 * Any two-digit code from 10 to 69 is accepted so that codes added by
 * later revisions of the protocol pass through; the names below are the
 * ones the protocol defines today.
 */
export const Status = {
  // ask the client to send the same URI again with input as the query.
  input: 10,
  // like `input`, but the client should not echo what the user types.
  sensitiveInput: 11,
  success: 20,
  redirectTemporary: 30,
  redirectPermanent: 31,
  temporaryFailure: 40,
  serverUnavailable: 41,
  cgiError: 42,
  proxyError: 43,
  // META carries the number of seconds the client must wait.
  slowDown: 44,
  permanentFailure: 50,
  notFound: 51,
  gone: 52,
  proxyRequestRefused: 53,
  badRequest: 59,
  clientCertificateRequired: 60,
  certificateNotAuthorised: 61,
  certificateNotValid: 62,
} as const;

export type StatusName = keyof typeof Status;
export type KnownStatus = (typeof Status)[StatusName];

export type StatusCategory =
  | "input"
  | "success"
  | "redirect"
  | "temporaryFailure"
  | "permanentFailure"
  | "clientCertificate";

const CATEGORIES: StatusCategory[] = [
  "input",
  "success",
  "redirect",
  "temporaryFailure",
  "permanentFailure",
  "clientCertificate",
];

export function isValidStatus(code: number): boolean {
  return Number.isInteger(code) && code >= 10 && code <= 69;
}

export function statusCategory(code: number): StatusCategory {
  if (!isValidStatus(code)) {
    throw new RangeError(`invalid status code: ${code}`);
  }
  return CATEGORIES[Math.floor(code / 10) - 1];
}

export function isSuccess(code: number): boolean {
  return statusCategory(code) === "success";
}

function isStatusName(name: string): name is StatusName {
  return name in Status;
}

// the protocol's name for a code, null for codes it does not define.
export function statusName(code: number): StatusName | null {
  for (const name of Object.keys(Status).filter(isStatusName)) {
    if (Status[name] === code) {
      return name;
    }
  }
  return null;
}
