import * as mimeTypes from "mime-types";
import {
  FOLDER_MIME_TYPE,
  NATIVE_MIME_PREFIX,
  RemoteFileEntry,
  UnsupportedExportError,
} from "../types";

/**
 * Export formats for native Google documents
 */
export const EXPORT_MIME_TYPES: Readonly<Record<string, string>> = {
  "application/vnd.google-apps.document":
    "application/vnd.openxmlformats-officedocument.wordprocessingml.document",
  "application/vnd.google-apps.spreadsheet":
    "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  "application/vnd.google-apps.drawing": "image/jpeg",
  "application/vnd.google-apps.presentation":
    "application/vnd.openxmlformats-officedocument.presentationml.presentation",
};

export function isFolder(entry: RemoteFileEntry): boolean {
  return entry.mimeType === FOLDER_MIME_TYPE;
}

/**
 * Native documents have no byte content and must be exported
 */
export function isNativeDocument(entry: RemoteFileEntry): boolean {
  return entry.mimeType.startsWith(NATIVE_MIME_PREFIX) && !isFolder(entry);
}

/**
 * Export mime type for a native document; throws for types with no mapping
 */
export function getExportMimeType(entry: RemoteFileEntry): string {
  const exportMimeType = EXPORT_MIME_TYPES[entry.mimeType];
  if (!exportMimeType) {
    throw new UnsupportedExportError(entry.mimeType, entry.name);
  }
  return exportMimeType;
}

/**
 * Local file name for an exported document, e.g. "plan" -> "plan.docx"
 */
export function getExportFileName(name: string, exportMimeType: string): string {
  const extension = mimeTypes.extension(exportMimeType);
  if (!extension || name.toLowerCase().endsWith(`.${extension}`)) {
    return name;
  }
  return `${name}.${extension}`;
}

/**
 * Get MIME type for a local file
 */
export function getMimeType(filePath: string): string {
  return mimeTypes.lookup(filePath) || "application/octet-stream";
}
