/**
 * `sokoban pack` — level authoring command
 *
 * Reads levels drawn in plain text (blank lines between levels, ';' for
 * comments), packs each one into the run-length level format and either
 * prints the entries or appends them to a levels.json corpus.
 */

import { readFileSync, writeFileSync, existsSync } from 'fs';
import { basename, extname, resolve } from 'path';
import * as p from '@clack/prompts';
import { decodeLevel } from './sokoban/levelDecoder';
import {
  LevelTextError,
  encodeLevel,
  formatLevelText,
  parseLevelText,
  splitLevelText,
  type LevelLayout,
} from './sokoban/levelEncoder';
import { bytesToHex, type LevelEntry } from './sokoban/levels';

// ---------------------------------------------------------------------------
// Corpus file
// ---------------------------------------------------------------------------

function isLevelEntry(value: unknown): value is LevelEntry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('name' in value) || typeof value.name !== 'string') return false;
  if (!('data' in value) || typeof value.data !== 'string') return false;
  return !('solution' in value) || value.solution === undefined || typeof value.solution === 'string';
}

/**
 * Entries of an existing levels.json, or none when the file does not exist yet
 */
export function readCorpus(path: string): LevelEntry[] {
  if (!existsSync(path)) return [];
  const data: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  const levels = typeof data === 'object' && data !== null && 'levels' in data ? data.levels : undefined;
  if (!Array.isArray(levels) || !levels.every(isLevelEntry)) {
    throw new Error(`${path} is not a level corpus (expected { "levels": [...] })`);
  }
  return levels;
}

// ---------------------------------------------------------------------------
// Packing
// ---------------------------------------------------------------------------

/**
 * Pack one layout and check the bytes decode back to the same drawing
 */
export function packLayout(layout: LevelLayout): string {
  const bytes = encodeLevel(layout);
  const drawn = formatLevelText(layout);
  if (formatLevelText(decodeLevel(bytes)) !== drawn) {
    throw new Error(`Packed level does not decode back to:\n${drawn}`);
  }
  return bytesToHex(bytes);
}

function parseArgs(args: string[]): { file?: string; out?: string } {
  const rest = [...args];
  let out: string | undefined;
  const outIdx = rest.indexOf('--out');
  if (outIdx !== -1) {
    out = rest[outIdx + 1];
    rest.splice(outIdx, 2);
  }
  return { file: rest[0], out };
}

// ---------------------------------------------------------------------------
// Command
// ---------------------------------------------------------------------------

export async function packCommand(args: string[]): Promise<void> {
  p.intro('sokoban pack');

  const { file, out } = parseArgs(args);
  if (!file) {
    p.cancel('Usage: sokoban pack <file> [--out <levels.json>]');
    process.exit(1);
  }

  const inputPath = resolve(file);
  if (!existsSync(inputPath)) {
    p.cancel(`File not found: ${inputPath}`);
    process.exit(1);
  }

  const blocks = splitLevelText(readFileSync(inputPath, 'utf-8'));
  if (blocks.length === 0) {
    p.cancel(`No levels found in ${file}`);
    process.exit(1);
  }

  const layouts: LevelLayout[] = [];
  for (let i = 0; i < blocks.length; i++) {
    try {
      layouts.push(parseLevelText(blocks[i]));
    } catch (err) {
      if (!(err instanceof LevelTextError)) throw err;
      p.log.error(`Level ${i + 1}: ${err.message}`);
      process.exit(1);
    }
  }

  const stem = basename(inputPath, extname(inputPath)).toUpperCase();
  const entries: LevelEntry[] = [];

  for (let i = 0; i < layouts.length; i++) {
    const layout = layouts[i];
    const data = packLayout(layout);
    p.note(formatLevelText(layout), `Level ${i + 1}: ${layout.width}x${layout.height}, ${data.length / 2} bytes`);

    const defaultName = layouts.length === 1 ? stem : `${stem} ${i + 1}`;
    const name = await p.text({
      message: `Name for level ${i + 1}:`,
      placeholder: defaultName,
      defaultValue: defaultName,
    });
    if (p.isCancel(name)) {
      p.cancel('Packing cancelled.');
      return;
    }

    entries.push({ name: name.trim().toUpperCase() || defaultName, data });
  }

  if (!out) {
    console.log(JSON.stringify(entries, null, 2));
    p.outro(`Packed ${entries.length} level${entries.length === 1 ? '' : 's'}.`);
    return;
  }

  const outPath = resolve(out);
  const existing = readCorpus(outPath);

  const confirmed = await p.confirm({
    message: `Append ${entries.length} level(s) to ${out} (${existing.length} already there)?`,
  });
  if (p.isCancel(confirmed) || !confirmed) {
    p.cancel('Nothing written.');
    return;
  }

  const s = p.spinner();
  s.start(`Writing ${out}...`);
  writeFileSync(outPath, JSON.stringify({ levels: [...existing, ...entries] }, null, 2) + '\n');
  s.stop(`Wrote ${existing.length + entries.length} levels to ${out}.`);

  p.outro('Done.');
}
