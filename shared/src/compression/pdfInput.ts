import * as fs from "node:fs/promises";
import { errnoCode } from "../errors.js";

export const PDF_SIGNATURE = "%PDF-";

export function hasPdfSignature(head: Buffer): boolean {
  return head.subarray(0, PDF_SIGNATURE.length).toString("latin1") === PDF_SIGNATURE;
}

export interface UploadedDocument {
  originalname: string;
  mimetype: string;
  buffer: Buffer;
}

/**
 * An upload counts as a PDF only when the name, the declared media type and
 * the leading bytes all agree.
 */
export function isPdfUpload(file: UploadedDocument): boolean {
  if (!file.originalname.toLowerCase().endsWith(".pdf")) return false;
  if (!file.mimetype.toLowerCase().includes("pdf")) return false;
  return hasPdfSignature(file.buffer);
}

/** First bytes of a file on disk, or null when it does not exist. */
export async function readFileHead(p: string, length = PDF_SIGNATURE.length): Promise<Buffer | null> {
  let handle: fs.FileHandle;
  try {
    handle = await fs.open(p, "r");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }
  try {
    const buffer = Buffer.alloc(length);
    const { bytesRead } = await handle.read(buffer, 0, length, 0);
    return buffer.subarray(0, bytesRead);
  } finally {
    await handle.close();
  }
}

/**
 * Reduce a client-supplied filename to something safe to echo back in a
 * Content-Disposition header: ASCII letters, digits, `_`, `.` and `-` only.
 */
export function secureFilename(name: string): string {
  const ascii = name.normalize("NFKD").replace(/[^\x20-\x7e]/g, "");
  const flattened = ascii.replace(/[/\\]/g, " ");
  return flattened
    .split(/\s+/)
    .filter(Boolean)
    .join("_")
    .replace(/[^A-Za-z0-9_.-]/g, "")
    .replace(/^[._]+|[._]+$/g, "");
}

export function downloadNameFor(originalFilename: string): string {
  const safe = secureFilename(originalFilename);
  const dot = safe.lastIndexOf(".");
  const stem = dot > 0 ? safe.slice(0, dot) : safe;
  return `${stem || "document"}-compressed.pdf`;
}
