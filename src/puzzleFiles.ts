import type { Grid } from './grid.ts';

import yaml from 'js-yaml';
import { readFileSync } from 'node:fs';
import { extname } from 'node:path';

import { GRID_SIZE } from './grid.ts';
import { parsePuzzleLine } from './parsers.ts';

export interface NamedPuzzle {
  readonly grid: Grid;
  readonly name: string;
}

const GRID_HEADER_PREFIX = 'Grid';
const YAML_EXTENSIONS = new Set(['.yaml', '.yml']);

export function loadPuzzleFile(path: string): NamedPuzzle[] {
  const content = readFileSync(path, 'utf-8');
  return YAML_EXTENSIONS.has(extname(path).toLowerCase()) ? parsePuzzleYaml(content) : parseGridBlocks(content);
}

/**
 * Parses blocks of a `Grid NN` header line followed by nine lines of nine digits.
 * Lines before the first header form an unnamed block.
 */
export function parseGridBlocks(text: string): NamedPuzzle[] {
  const puzzles: NamedPuzzle[] = [];
  let name: null | string = null;
  let rows: string[] = [];

  function flush(): void {
    if (rows.length === 0) {
      return;
    }
    const puzzleName = name ?? `Grid ${String(puzzles.length + 1).padStart(2, '0')}`;
    if (rows.length !== GRID_SIZE) {
      throw new Error(`${puzzleName}: expected ${String(GRID_SIZE)} rows, got ${String(rows.length)}`);
    }
    puzzles.push({ grid: parsePuzzleLine(rows.join('')), name: puzzleName });
    rows = [];
  }

  for (const rawLine of text.split(/\r?\n/)) {
    const line = rawLine.trim();
    if (!line) {
      continue;
    }
    if (line.startsWith(GRID_HEADER_PREFIX)) {
      flush();
      name = line;
      continue;
    }
    rows.push(line);
  }
  flush();
  return puzzles;
}

/**
 * Parses `puzzles: [{ name, grid }]`, where `grid` is one 81-character line or a list of nine row strings.
 */
export function parsePuzzleYaml(text: string): NamedPuzzle[] {
  const spec = yaml.load(text);
  if (typeof spec !== 'object' || spec === null || !('puzzles' in spec)) {
    throw new Error('YAML puzzle file must be a mapping with a puzzles list');
  }
  const items = spec.puzzles;
  if (!Array.isArray(items) || items.length === 0) {
    throw new Error('puzzles must be a non-empty list');
  }

  return items.map((item: unknown, idx) => {
    if (typeof item !== 'object' || item === null) {
      throw new Error(`puzzles[${String(idx)}] must be a mapping`);
    }
    const grid = 'grid' in item ? item.grid : undefined;
    const rawName = 'name' in item ? item.name : undefined;
    const name = typeof rawName === 'string' && rawName.trim() ? rawName.trim() : `Puzzle ${String(idx + 1)}`;
    if (typeof grid === 'string') {
      return { grid: parsePuzzleLine(grid), name };
    }
    if (Array.isArray(grid) && grid.length === GRID_SIZE) {
      return { grid: parsePuzzleLine(grid.map(String).join('')), name };
    }
    throw new Error(`puzzles[${String(idx)}].grid must be a string of 81 cells or a list of ${String(GRID_SIZE)} rows`);
  });
}
