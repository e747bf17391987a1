/**
 * CLI entry point for typedash
 *
 * Resolves options and the word sample, then hands a Node terminal
 * adapter to the typing game and waits for its stats.
 */

import * as p from '@clack/prompts';
import { ConfigError, getHelpText, parseArgs, type CliOptions } from './config';
import { CorpusError, listCorpora, loadCorpus, sampleWords } from './corpus';
import { runTypingGame } from './games/typing';
import { setTheme } from './games/utils';
import { debugLog } from './log';
import { createNodeTerminal, type NodeTerminal } from './terminal';

// ---------------------------------------------------------------------------
// Game lifecycle
// ---------------------------------------------------------------------------

async function play(options: CliOptions): Promise<void> {
  // Corpus problems surface before the terminal goes raw
  const corpus = loadCorpus(options.corpus);
  const words = sampleWords(corpus);
  debugLog('CLI', `loaded ${corpus.length} words from ${options.corpus}`);

  setTheme(options.theme);
  const terminal: NodeTerminal = createNodeTerminal();

  process.on('exit', terminal.cleanup);
  const onSignal = () => {
    terminal.cleanup();
    process.exit(130);
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    const game = runTypingGame(terminal, {
      words,
      maxTime: options.time,
      width: options.width,
      rigorousSpaces: options.rigorousSpaces,
    });
    await game.done;
  } finally {
    terminal.cleanup();
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  if (options.help) {
    console.log(getHelpText());
    return;
  }

  if (options.list) {
    for (const name of listCorpora()) {
      console.log(name);
    }
    return;
  }

  await play(options);
}

main().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    p.log.error(error.message);
    p.log.info('Run `typedash --help` for usage.');
  } else if (error instanceof CorpusError) {
    p.log.error(error.message);
    p.log.info('Run `typedash --list` for the built-in corpora.');
  } else {
    p.log.error(error instanceof Error ? error.stack ?? error.message : String(error));
  }
  process.exitCode = 1;
});
