import { extname } from "path";

import table from "./mime-types.json";

type MimeMapping = {
  extension: string;
  mimeType: string;
};

const mappings: MimeMapping[] = table;

// the protocol's own content type, used when nothing else matches.
export const DEFAULT_MIME_TYPE = "text/gemini; charset=UTF-8";

export class MimeType {
  constructor(readonly text: string) {}

  toString(): string {
    return this.text;
  }

  toExtension(): string | null {
    return toExtension(this);
  }
}

export function fromExtension(ext: string): MimeType {
  const wanted = ext.toLowerCase();
  const found = mappings.find((m) => m.extension === wanted);
  return new MimeType(found ? found.mimeType : DEFAULT_MIME_TYPE);
}

export function fromFileName(name: string): MimeType {
  return fromExtension(extname(name));
}

// first extension registered for the type, null when the table has none.
export function toExtension(mime: MimeType | string): string | null {
  const text = typeof mime === "string" ? mime : mime.text;
  const found = mappings.find((m) => m.mimeType === text);
  return found ? found.extension : null;
}
