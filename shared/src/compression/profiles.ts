import type { CompressionProfile } from "../types.js";

/** Ghostscript -dPDFSETTINGS preset for each profile. */
export const COMPRESSION_PRESETS: Readonly<Record<CompressionProfile, string>> = {
  low: "/printer",
  medium: "/ebook",
  high: "/screen",
};

export const DEFAULT_PROFILE: CompressionProfile = "medium";

export function isCompressionProfile(value: string): value is CompressionProfile {
  return Object.prototype.hasOwnProperty.call(COMPRESSION_PRESETS, value);
}

export function presetFor(profile: CompressionProfile): string {
  return COMPRESSION_PRESETS[profile];
}
