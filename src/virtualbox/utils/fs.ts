import fs from "node:fs";
import os from "node:os";
import path from "node:path";

export async function ensureDirectory(dirPath: string): Promise<void> {
  await fs.promises.mkdir(dirPath, { recursive: true });
}

export async function removePathIfExists(targetPath: string): Promise<void> {
  await fs.promises.rm(targetPath, { recursive: true, force: true });
}

export function fileExists(targetPath: string): boolean {
  return fs.existsSync(targetPath);
}

export function isRegularFile(filePath: string): boolean {
  return fs.existsSync(filePath) && fs.statSync(filePath).isFile();
}

export function getCacheRoot(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env.VBOX_BUILD_CACHE_DIR;
  if (explicit && explicit.trim().length > 0) {
    return path.resolve(explicit);
  }

  const xdgCache = env.XDG_CACHE_HOME;
  if (xdgCache && xdgCache.trim().length > 0) {
    return path.resolve(xdgCache, "vbox-build");
  }

  return path.resolve(os.homedir(), ".cache", "vbox-build");
}

export function listDirectorySafely(dirPath: string): string[] {
  if (!fs.existsSync(dirPath)) {
    return [];
  }

  const stat = fs.lstatSync(dirPath);
  if (!stat.isDirectory()) {
    return [];
  }

  return fs.readdirSync(dirPath);
}

