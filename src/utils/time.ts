const pad = (value: number): string => value.toString().padStart(2, "0");

/**
 * Local-time YYYYMMDDHHMMSS stamp, sortable as a string
 */
export function formatTimestamp(date: Date): string {
  return (
    date.getFullYear().toString() +
    pad(date.getMonth() + 1) +
    pad(date.getDate()) +
    pad(date.getHours()) +
    pad(date.getMinutes()) +
    pad(date.getSeconds())
  );
}

/**
 * Remote name for an uploaded repository archive
 */
export function codeArchiveName(repositoryName: string, date: Date): string {
  return `code_v${formatTimestamp(date)}${repositoryName}.zip`;
}

/**
 * Object key for the uploaded documentation archive
 */
export function docArchiveKey(projectName: string, date: Date): string {
  return `doc_v${formatTimestamp(date)}_${projectName}.zip`;
}

/**
 * Format duration for display
 */
export function formatDuration(ms: number): string {
  if (ms < 1) {
    return `${ms.toFixed(2)}ms`;
  } else if (ms < 1000) {
    return `${Math.round(ms)}ms`;
  } else if (ms < 2000) {
    return `${(ms / 1000).toFixed(2)}s`;
  } else {
    return `${(ms / 1000).toFixed(1)}s`;
  }
}
