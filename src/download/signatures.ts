import { ValidationError } from "../core/errors";

export type ArtifactKind = "pdf" | "any";

const PDF_MAGIC = Buffer.from("%PDF", "ascii");

export function hasPdfSignature(bytes: Uint8Array): boolean {
  return bytes.length >= PDF_MAGIC.length && PDF_MAGIC.every((value, index) => bytes[index] === value);
}

/** Throws `ValidationError` when `bytes` do not look like an artifact of `kind`. */
export function assertSignature(kind: ArtifactKind, bytes: Uint8Array, url: string): void {
  if (bytes.length === 0) {
    throw new ValidationError(`empty response body from ${url}`);
  }
  if (kind === "pdf" && !hasPdfSignature(bytes)) {
    const head = Buffer.from(bytes.subarray(0, 16)).toString("latin1").replace(/[^\x20-\x7e]/g, ".");
    throw new ValidationError(`response from ${url} is not a PDF (starts with '${head}')`);
  }
}
