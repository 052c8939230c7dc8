import { out } from "../cli/output";
import { formatDuration } from "./time";

/**
 * Global tracing state
 */
let tracingEnabled = false;

/**
 * Enable or disable tracing
 */
export function setTracingEnabled(enabled: boolean): void {
  tracingEnabled = enabled;
}

/**
 * Time a step and print its duration below the active task
 * Only outputs if tracing is enabled
 *
 * Usage:
 *   await span("clone repo", archiveRepository(repo, dir))
 */
export async function span<T>(name: string, promise: Promise<T>): Promise<T> {
  if (!tracingEnabled) {
    return promise;
  }

  const start = performance.now();
  const value = await promise;
  out.taskLine(`${name} (${formatDuration(performance.now() - start)})`, true);
  return value;
}
