import * as fs from "fs";

export function fileExists(filePath: string): boolean {
  try {
    return fs.existsSync(filePath);
  } catch {
    return false;
  }
}

export function ensureDir(dirPath: string): void {
  if (!fs.existsSync(dirPath)) {
    fs.mkdirSync(dirPath, { recursive: true });
  }
}

export function isDirectory(p: string): boolean {
  try {
    const stats = fs.statSync(p);
    return stats.isDirectory();
  } catch {
    return false;
  }
}

export function isFile(p: string): boolean {
  try {
    const stats = fs.statSync(p);
    return stats.isFile();
  } catch {
    return false;
  }
}

export function writeTextFile(filePath: string, content: string, encoding?: BufferEncoding): void {
  fs.writeFileSync(filePath, content, { encoding: encoding || "utf-8" });
}
