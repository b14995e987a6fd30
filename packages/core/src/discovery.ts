import { stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import { expandHome, stableId } from "./utils.js";

export interface DiscoveredLogFile {
  id: string;
  path: string;
  /** File name without extension; names the session's output directory. */
  sessionName: string;
  sizeBytes: number;
  mtimeMs: number;
}

export interface DiscoverOptions {
  cwd?: string;
  ignore?: string[];
}

/** Expands globs (and plain paths) into the log files to replay, sorted by path. */
export async function discoverLogFiles(patterns: string[], options: DiscoverOptions = {}): Promise<DiscoveredLogFile[]> {
  const cwd = options.cwd ?? process.cwd();
  const matches = await fg(patterns.map(expandHome), {
    cwd,
    absolute: true,
    onlyFiles: true,
    dot: true,
    suppressErrors: true,
    ignore: options.ignore ?? [],
    unique: true,
    followSymbolicLinks: false,
  });

  const files: DiscoveredLogFile[] = [];
  for (const filePath of matches) {
    try {
      const fileStat = await stat(filePath);
      const resolved = path.resolve(filePath);
      files.push({
        id: stableId([resolved, String(fileStat.dev), String(fileStat.ino)]),
        path: resolved,
        sessionName: path.basename(resolved, path.extname(resolved)),
        sizeBytes: fileStat.size,
        mtimeMs: fileStat.mtimeMs,
      });
    } catch {
      // vanished between glob and stat
    }
  }
  return files.sort((left, right) => left.path.localeCompare(right.path));
}
