import os from "os";
import path from "path";

export const INDEX_FILE_NAME = ".fnrecall.sqlite";

export function getDefaultIndexPath(): string {
  return path.join(os.homedir(), INDEX_FILE_NAME);
}

export function resolveIndexPath(location: string): string {
  if (location === "~") return os.homedir();
  if (location.startsWith("~/")) {
    return path.join(os.homedir(), location.slice(2));
  }
  return path.resolve(location);
}
