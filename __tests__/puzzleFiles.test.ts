import { fileURLToPath } from 'node:url';
import {
  describe,
  expect,
  it
} from 'vitest';

import { formatPuzzleLine } from '../src/parsers.ts';
import {
  loadPuzzleFile,
  parseGridBlocks,
  parsePuzzleYaml
} from '../src/puzzleFiles.ts';
import {
  CLASSIC_PUZZLE,
  DUPLICATE_ROW_PUZZLE,
  EMPTY_PUZZLE,
  ONE_BLANK_PUZZLE
} from './sudokuTestHelper.ts';

function rowsOf(line: string): string[] {
  return Array.from({ length: 9 }, (_, r) => line.substring(r * 9, (r + 1) * 9));
}

function samplePath(fileName: string): string {
  return fileURLToPath(new URL(`../puzzles/${fileName}`, import.meta.url));
}

describe('parseGridBlocks', () => {
  it('reads named blocks and skips blank lines', () => {
    const text = ['Grid 01', ...rowsOf(CLASSIC_PUZZLE), '', '', 'Grid 02', ...rowsOf(ONE_BLANK_PUZZLE), ''].join('\n');
    const puzzles = parseGridBlocks(text);
    expect(puzzles.map((p) => p.name)).toEqual(['Grid 01', 'Grid 02']);
    expect(formatPuzzleLine(puzzles[0]?.grid ?? [])).toBe(CLASSIC_PUZZLE);
    expect(formatPuzzleLine(puzzles[1]?.grid ?? [])).toBe(ONE_BLANK_PUZZLE);
  });

  it('names a block without a header by its position', () => {
    const puzzles = parseGridBlocks(rowsOf(CLASSIC_PUZZLE).join('\r\n'));
    expect(puzzles).toHaveLength(1);
    expect(puzzles[0]?.name).toBe('Grid 01');
  });

  it('throws for a block with too few rows', () => {
    const text = ['Grid 07', ...rowsOf(CLASSIC_PUZZLE).slice(0, 8)].join('\n');
    expect(() => parseGridBlocks(text)).toThrow('Grid 07: expected 9 rows, got 8');
  });

  it('returns nothing for empty text', () => {
    expect(parseGridBlocks('\n\n')).toEqual([]);
  });
});

describe('parsePuzzleYaml', () => {
  it('reads line and row-list grids', () => {
    const text = [
      'puzzles:',
      '  - name: Line',
      `    grid: "${CLASSIC_PUZZLE}"`,
      '  - grid:',
      ...rowsOf(ONE_BLANK_PUZZLE).map((row) => `      - "${row}"`)
    ].join('\n');
    const puzzles = parsePuzzleYaml(text);
    expect(puzzles.map((p) => p.name)).toEqual(['Line', 'Puzzle 2']);
    expect(formatPuzzleLine(puzzles[1]?.grid ?? [])).toBe(ONE_BLANK_PUZZLE);
  });

  it('throws when puzzles is missing', () => {
    expect(() => parsePuzzleYaml('title: none')).toThrow('YAML puzzle file must be a mapping with a puzzles list');
  });

  it('throws for an empty puzzles list', () => {
    expect(() => parsePuzzleYaml('puzzles: []')).toThrow('puzzles must be a non-empty list');
  });

  it('throws for a grid of the wrong type', () => {
    expect(() => parsePuzzleYaml('puzzles:\n  - grid: 42')).toThrow('puzzles[0].grid must be a string of 81 cells or a list of 9 rows');
  });

  it('throws for an entry that is not a mapping', () => {
    expect(() => parsePuzzleYaml('puzzles:\n  - just text')).toThrow('puzzles[0] must be a mapping');
  });
});

describe('loadPuzzleFile', () => {
  it('loads the sample YAML file', () => {
    const puzzles = loadPuzzleFile(samplePath('sample.yaml'));
    expect(puzzles.map((p) => p.name)).toEqual(['Classic', 'Empty board', 'Duplicate clue in row A']);
    expect(formatPuzzleLine(puzzles[1]?.grid ?? [])).toBe(EMPTY_PUZZLE);
    expect(formatPuzzleLine(puzzles[2]?.grid ?? [])).toBe(DUPLICATE_ROW_PUZZLE);
  });

  it('loads the sample grid text file', () => {
    const puzzles = loadPuzzleFile(samplePath('sample.txt'));
    expect(puzzles.map((p) => p.name)).toEqual(['Grid 01', 'Grid 02', 'Grid 03']);
    expect(formatPuzzleLine(puzzles[0]?.grid ?? [])).toBe(CLASSIC_PUZZLE);
  });
});
