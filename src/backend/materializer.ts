import * as fs from "node:fs";
import * as path from "node:path";
import { ensureDir } from "../utils/fileSystem";

function isDirectoryEntry(entry: fs.Dirent, entryPath: string): boolean {
  if (entry.isSymbolicLink()) {
    // links are followed; the copy holds whatever they point at
    return fs.statSync(entryPath).isDirectory();
  }
  return entry.isDirectory();
}

/////////////////////////////////////////////////////////////////////////////////
function copyDirectoryContents(sourceDir: string, targetDir: string): number {
  let copied = 0;
  const entries = fs.readdirSync(sourceDir, { withFileTypes: true });
  for (const entry of entries) {
    const sourcePath = path.join(sourceDir, entry.name);
    const targetPath = path.join(targetDir, entry.name);

    if (isDirectoryEntry(entry, sourcePath)) {
      ensureDir(targetPath);
      copied += copyDirectoryContents(sourcePath, targetPath);
      continue;
    }

    // byte-for-byte, overwriting whatever is already there
    fs.copyFileSync(sourcePath, targetPath);
    copied++;
  }
  return copied;
}

/////////////////////////////////////////////////////////////////////////////////
// Copies the whole tree under sourceDir into destinationDir, creating directories as needed.
// No filtering: every file is copied regardless of its name. I/O errors propagate.
// Returns the number of files copied.
export function materializeTemplate(sourceDir: string, destinationDir: string): number {
  ensureDir(destinationDir);
  return copyDirectoryContents(sourceDir, destinationDir);
}
