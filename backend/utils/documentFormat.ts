import { UnsupportedFormatError } from "./errors.js";

/** "image": single-page raster, OCR'd synchronously. "multiPage": async text detection job. */
export type DocumentFormat = "image" | "multiPage";

const FORMATS_BY_EXTENSION: Partial<Record<string, DocumentFormat>> = {
  ".pdf": "multiPage",
  ".png": "image",
  ".jpeg": "image",
  ".jpg": "image",
  ".tiff": "image",
};

export const SUPPORTED_EXTENSIONS = Object.keys(FORMATS_BY_EXTENSION);

export const SUMMARY_SUFFIX = "-summary.txt";

/**
 * Lowercased final extension of an object key including the dot, or "" when there is none
 */
export function getExtension(key: string): string {
  const fileName = key.slice(key.lastIndexOf("/") + 1);
  const dot = fileName.lastIndexOf(".");
  return dot > 0 ? fileName.slice(dot).toLowerCase() : "";
}

export function classifyDocument(key: string): DocumentFormat {
  const extension = getExtension(key);
  const format = FORMATS_BY_EXTENSION[extension];
  if (!format) {
    throw new UnsupportedFormatError(key, extension);
  }
  return format;
}

/**
 * True for objects this function wrote itself, so uploading a summary never triggers another run
 */
export function isSummaryArtifact(key: string): boolean {
  return key.toLowerCase().endsWith(SUMMARY_SUFFIX);
}

/**
 * "reports/q3.pdf" -> "reports/q3-summary.txt"
 */
export function toSummaryKey(key: string): string {
  const extension = getExtension(key);
  const base = extension ? key.slice(0, key.length - extension.length) : key;
  return `${base}${SUMMARY_SUFFIX}`;
}
