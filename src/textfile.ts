import fs from 'node:fs/promises';
import path from 'node:path';

/**
 * Writes the exposition next to its final name and renames it into place, so
 * the textfile collector never reads a partial file.
 */
export async function writeTextfile(filePath: string, contents: string): Promise<string> {
  const resolvedPath = path.resolve(filePath);
  const directory = path.dirname(resolvedPath);
  const tempPath = path.join(directory, `.${path.basename(resolvedPath)}.${process.pid}.tmp`);

  await fs.mkdir(directory, { recursive: true });
  try {
    await fs.writeFile(tempPath, contents, 'utf-8');
    await fs.rename(tempPath, resolvedPath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }

  return resolvedPath;
}
