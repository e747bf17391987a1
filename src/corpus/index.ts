/**
 * Word corpora
 *
 * Built-in corpora live in the package's data/ directory as
 * whitespace-separated word lists (<name>.txt). Any other corpus name is
 * read as a file path.
 */

import { existsSync, readdirSync, readFileSync } from 'fs';
import { basename, dirname, extname, resolve } from 'path';
import { fileURLToPath } from 'url';

/** Words drawn for one game */
export const SAMPLE_SIZE = 1000;

export const DEFAULT_CORPUS = 'english';

const CORPUS_EXTENSION = '.txt';

export class CorpusError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CorpusError';
  }
}

// ---------------------------------------------------------------------------
// Built-in corpora
// ---------------------------------------------------------------------------

let corporaDir: string | null = null;

/**
 * Locate the data/ directory. Walks up from this file, so it works both
 * from src/corpus/ and from the bundled dist/.
 */
export function getCorporaDir(): string {
  if (corporaDir) return corporaDir;

  let dir = dirname(fileURLToPath(import.meta.url));
  for (let i = 0; i < 5; i++) {
    const candidate = resolve(dir, 'data');
    if (existsSync(resolve(candidate, DEFAULT_CORPUS + CORPUS_EXTENSION))) {
      corporaDir = candidate;
      return candidate;
    }
    dir = resolve(dir, '..');
  }
  throw new CorpusError('Built-in corpora not found (missing data/ directory)');
}

/**
 * Names of the built-in corpora, sorted
 */
export function listCorpora(dir: string = getCorporaDir()): string[] {
  return readdirSync(dir)
    .filter(file => extname(file) === CORPUS_EXTENSION)
    .map(file => basename(file, CORPUS_EXTENSION))
    .sort();
}

/**
 * Resolve a corpus name to a file: a built-in corpus if one has that name,
 * otherwise the name itself taken as a path.
 */
export function resolveCorpusPath(name: string, dir: string = getCorporaDir()): string {
  const builtIn = resolve(dir, name + CORPUS_EXTENSION);
  if (existsSync(builtIn)) return builtIn;
  return resolve(name);
}

// ---------------------------------------------------------------------------
// Parsing and sampling
// ---------------------------------------------------------------------------

/**
 * Split corpus text into words on any run of whitespace
 */
export function parseCorpus(text: string): string[] {
  return text.split(/\s+/).filter(word => word !== '');
}

/**
 * Read and parse a corpus by name or path. Fails on unreadable or empty
 * files, before any game is set up.
 */
export function loadCorpus(name: string, dir?: string): string[] {
  const path = resolveCorpusPath(name, dir);

  let text: string;
  try {
    text = readFileSync(path, 'utf-8');
  } catch (error) {
    throw new CorpusError(`Cannot read corpus "${name}" (${path})`, { cause: error });
  }

  const words = parseCorpus(text);
  if (words.length === 0) {
    throw new CorpusError(`Corpus "${name}" has no words (${path})`);
  }
  return words;
}

/**
 * Draw `size` words uniformly at random, with replacement
 */
export function sampleWords(
  corpus: readonly string[],
  size: number = SAMPLE_SIZE,
  random: () => number = Math.random
): string[] {
  if (corpus.length === 0) {
    throw new CorpusError('Cannot sample from an empty corpus');
  }
  const words: string[] = [];
  for (let i = 0; i < size; i++) {
    words.push(corpus[Math.floor(random() * corpus.length)]);
  }
  return words;
}
