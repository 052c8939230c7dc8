import * as path from "path";
import { glob } from "glob";
import { pathExists, removePath } from "../utils";

/**
 * Remove every `*.zip` directly inside the working directory and the
 * project's documentation directory. Nothing else is touched.
 * Returns the removed paths.
 */
export async function removeLocalArtifacts(
  workingDir: string,
  projectName: string
): Promise<string[]> {
  const removed: string[] = [];

  const archives = await glob("*.zip", {
    cwd: workingDir,
    dot: true,
    nodir: true,
    absolute: true,
  });
  for (const archive of archives.sort()) {
    await removePath(archive);
    removed.push(archive);
  }

  const projectDir = path.join(workingDir, projectName);
  if (await pathExists(projectDir)) {
    await removePath(projectDir);
    removed.push(projectDir);
  }

  return removed;
}
