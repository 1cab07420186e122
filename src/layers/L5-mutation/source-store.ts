import fs from 'fs';
import path from 'path';
import { minimatch } from 'minimatch';
import { createLogger } from '../../shared/logger';

const log = createLogger({ layer: 'L5', module: 'source-store' });

/** Read/write access to project sources, addressed by root-relative path. */
export interface SourceStore {
  read(file: string): Promise<string>;
  /** Raw file bytes; restores write these back verbatim. */
  readBytes(file: string): Promise<Buffer>;
  write(file: string, content: string | Buffer): Promise<void>;
}

export class FileSystemSourceStore implements SourceStore {
  constructor(private readonly root: string) {}

  resolve(file: string): string {
    return path.join(this.root, file);
  }

  async read(file: string): Promise<string> {
    return fs.readFileSync(this.resolve(file), 'utf-8');
  }

  async readBytes(file: string): Promise<Buffer> {
    return fs.readFileSync(this.resolve(file));
  }

  /** Atomic write: temp file in the same directory, then rename. */
  async write(file: string, content: string | Buffer): Promise<void> {
    const target = this.resolve(file);
    const tmpPath = `${target}.mutaform-tmp`;
    fs.writeFileSync(tmpPath, content);
    fs.renameSync(tmpPath, target);
  }
}

export interface SourcePatterns {
  include: string[];
  exclude: string[];
}

/** Root-relative files matching `include` and not `exclude`, sorted. */
export function discoverSources(root: string, patterns: SourcePatterns): string[] {
  const matches = (file: string, globs: string[]): boolean => globs.some((glob) => minimatch(file, glob, { dot: true }));
  return walkDir(root, '')
    .filter((file) => matches(file, patterns.include) && !matches(file, patterns.exclude))
    .sort();
}

function walkDir(root: string, dir: string): string[] {
  const results: string[] = [];
  const absDir = path.join(root, dir);

  try {
    const entries = fs.readdirSync(absDir, { withFileTypes: true });
    for (const entry of entries) {
      if (entry.name.startsWith('.') || entry.name === 'node_modules') continue;
      const relPath = dir ? `${dir}/${entry.name}` : entry.name;
      if (entry.isDirectory()) {
        results.push(...walkDir(root, relPath));
      } else {
        results.push(relPath);
      }
    }
  } catch (err) {
    log.debug({ dir: absDir, err }, 'Skipping unreadable directory');
  }

  return results;
}
