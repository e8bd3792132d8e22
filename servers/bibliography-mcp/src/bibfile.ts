import { existsSync } from 'fs';
import { readdir, readFile, rename, stat, unlink, writeFile } from 'fs/promises';
import { extname, join } from 'path';
import { parseBibEntries, type OutputEntrySet } from '@citefetch/core';

/** A .bib file that does not exist yet reads as empty. */
export async function readBibFile(path: string): Promise<OutputEntrySet> {
  if (!existsSync(path)) {
    return new Map();
  }
  return parseBibEntries(await readFile(path, 'utf-8'));
}

export function serializeEntries(entries: OutputEntrySet): string {
  const blocks = [...entries.values()].map(entry => entry.trim());
  return blocks.length ? `${blocks.join('\n\n')}\n` : '';
}

/** Writes to a sibling temp file first so readers never see a half-written .bib. */
export async function writeBibFile(path: string, entries: OutputEntrySet): Promise<void> {
  const tmpPath = `${path}.${process.pid}.tmp`;
  try {
    await writeFile(tmpPath, serializeEntries(entries), 'utf-8');
    await rename(tmpPath, path);
  } catch (error) {
    if (existsSync(tmpPath)) {
      await unlink(tmpPath);
    }
    throw error;
  }
}

/** Expands directories into the .tex files below them, sorted for a stable key order. */
export async function collectTexFiles(paths: string[]): Promise<string[]> {
  const files: string[] = [];
  for (const path of paths) {
    const info = await stat(path);
    if (!info.isDirectory()) {
      files.push(path);
      continue;
    }
    const below = await readdir(path, { recursive: true });
    files.push(...below
      .filter(name => extname(name) === '.tex')
      .sort()
      .map(name => join(path, name)));
  }
  return files;
}
