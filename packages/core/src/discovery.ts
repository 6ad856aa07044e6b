import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import fg from "fast-glob";
import type { MediaType, SourceDocument } from "@ingestline/types";
import { ConfigurationError } from "@ingestline/errors";
import { detectMediaType } from "@ingestline/extractor";
import { sha256Hex } from "@ingestline/chunker";

export interface DiscoveredDocument {
  /** Path relative to the input root, POSIX separators. */
  id: string;
  /** Absolute path on disk. */
  path: string;
  mediaType: MediaType;
}

export interface DiscoverOptions {
  cwd?: string;
  /**
   * Directory the ids are relative to. Without it the common root of the
   * selectors is used, so the same file can get a different id when the
   * selectors change.
   */
  root?: string;
}

const IGNORE = ["**/*.sha256"];

function toPosix(value: string): string {
  return value.split(path.sep).join("/");
}

/** Leading path segments of a glob pattern that contain no glob syntax. */
export function staticBase(pattern: string): string {
  const segments = pattern.split("/");
  const base: string[] = [];
  for (const segment of segments.slice(0, -1)) {
    if (fg.isDynamicPattern(segment)) {
      break;
    }
    base.push(segment);
  }
  return base.length === 0 ? "." : base.join("/");
}

function commonAncestor(dirs: string[]): string {
  const [first, ...rest] = dirs.map((dir) => dir.split(path.sep));
  if (!first) {
    return path.sep;
  }
  let length = first.length;
  for (const parts of rest) {
    let i = 0;
    while (i < length && i < parts.length && parts[i] === first[i]) {
      i++;
    }
    length = i;
  }
  return first.slice(0, length).join(path.sep) || path.sep;
}

function isHidden(file: string, root: string): boolean {
  return path
    .relative(root, file)
    .split(path.sep)
    .some((segment) => segment.startsWith("."));
}

async function expandSelector(
  selector: string,
  cwd: string,
): Promise<{ root: string; files: string[] }> {
  const options = { absolute: true, onlyFiles: true, dot: false, ignore: IGNORE };

  if (fg.isDynamicPattern(selector)) {
    const pattern = toPosix(selector);
    const files = await fg(pattern, { ...options, cwd });
    return { root: path.resolve(cwd, staticBase(pattern)), files };
  }

  const resolved = path.resolve(cwd, selector);
  const info = await stat(resolved).catch((err: unknown) => {
    throw new ConfigurationError(`No such file or directory: ${selector}`, {}, { cause: err });
  });

  if (info.isDirectory()) {
    const files = await fg("**/*", { ...options, cwd: resolved });
    return { root: resolved, files };
  }
  return { root: path.dirname(resolved), files: [resolved] };
}

/**
 * Resolve file paths, directories (recursively) and glob patterns to a
 * sorted, de-duplicated list of documents. Ids are relative to `root` when
 * given, otherwise to the common root of all selectors, so they stay unique
 * across selectors.
 */
export async function discoverDocuments(
  selectors: readonly string[],
  options?: DiscoverOptions,
): Promise<DiscoveredDocument[]> {
  const cwd = path.resolve(options?.cwd ?? process.cwd());
  const expanded = await Promise.all(selectors.map((selector) => expandSelector(selector, cwd)));
  if (expanded.length === 0) {
    return [];
  }

  const root = options?.root
    ? path.resolve(cwd, options.root)
    : commonAncestor(expanded.map((entry) => entry.root));
  const files = new Set<string>();
  for (const entry of expanded) {
    for (const file of entry.files) {
      const absolute = path.resolve(file);
      if (absolute.endsWith(".sha256") || isHidden(absolute, entry.root)) {
        continue;
      }
      const relative = path.relative(root, absolute);
      if (relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
        const shown = toPosix(path.relative(cwd, absolute));
        throw new ConfigurationError(`${shown} is outside the root ${options?.root ?? root}`);
      }
      files.add(absolute);
    }
  }

  return [...files]
    .map((file) => ({
      id: toPosix(path.relative(root, file)),
      path: file,
      mediaType: detectMediaType(file),
    }))
    .sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
}

export async function readSourceDocument(document: DiscoveredDocument): Promise<SourceDocument> {
  const buffer = await readFile(document.path);
  const content = new Uint8Array(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  return {
    id: document.id,
    path: document.path,
    content,
    mediaType: document.mediaType,
    sizeBytes: content.byteLength,
    contentHash: sha256Hex(content),
  };
}
