import type { FileContent } from "./platform.js";

const SNIFF_BYTES = 8000;

export function looksBinary(bytes: Uint8Array): boolean {
  const end = Math.min(bytes.length, SNIFF_BYTES);
  for (let i = 0; i < end; i += 1) {
    if (bytes[i] === 0) return true;
  }
  return false;
}

export function looksBinaryText(text: string): boolean {
  return text.slice(0, SNIFF_BYTES).includes("\u0000");
}

/**
 * Decodes raw blob bytes for rewriting. Anything that is not valid UTF-8 is
 * reported as unsupported so it is never written back re-encoded. A leading
 * BOM is kept.
 */
export function decodeBlob(bytes: Uint8Array): FileContent {
  if (looksBinary(bytes)) return { kind: "binary" };
  try {
    const content = new TextDecoder("utf-8", { fatal: true, ignoreBOM: true }).decode(bytes);
    return { kind: "text", content };
  } catch {
    return { kind: "unsupported-encoding", encoding: "non-utf8" };
  }
}
