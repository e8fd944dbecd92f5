#!/usr/bin/env node
/**
 * chessgrid CLI
 *
 * Usage: chessgrid <command> [options]
 *
 * Commands:
 *   new            - Print a starting position
 *   fen <fen>      - Check and show a FEN position
 *   perft <depth>  - Count move-generation leaves
 *   play           - AI vs AI game
 *   best <fen>     - Ask the AI for a move
 */

import meow from 'meow';
import chalk from 'chalk';
import { z } from 'zod';
import { loadRuntimeConfig } from './config.js';
import {
  ChessAI,
  ChessAIMatch,
  ChessEngine,
  SETUP_MODES,
  SETUP_MODE_NAMES,
  createChessEngineFromFen,
  decodeFen,
  divide,
  evaluateOutcome,
  allLegalMoves,
  perft,
  squareName,
} from './chess/index.js';
import type { Outcome, Position } from './chess/index.js';

const cli = meow(`
  Usage
    $ chessgrid <command> [options]

  Commands
    new              Print a starting position and its FEN
    fen <fen>        Validate a FEN string and show the board
    perft <depth>    Count leaf positions (start position unless --fen)
    play             Let two AIs play a game
    best <fen>       Print the AI's move for a position

  Options
    --mode, -m       Setup: ${SETUP_MODES.filter(m => m !== 'custom').join(', ')} (default two-lines)
    --size, -s       Board size, 3-99 (default CHESSGRID_BOARD_SIZE or 26)
    --fen            Position for perft
    --divide         Break perft down per root move
    --white, --black Difficulty per side for play: easy, medium, hard
    --difficulty, -d Difficulty for best (default medium)
    --plies          Ply limit for play (default 200)
    --verbose, -v    Print every move of play

  Examples
    $ chessgrid new --mode three-lines --size 12
    $ chessgrid perft 3 --fen "8:rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1"
    $ chessgrid play --size 8 --white easy --black hard -v
    $ chessgrid best "8:6k1/8/6K1/8/8/8/8/Q7 w - - 0 1" -d hard
`, {
  importMeta: import.meta,
  flags: {
    mode: {
      type: 'string',
      shortFlag: 'm',
      default: 'two-lines',
    },
    size: {
      type: 'number',
      shortFlag: 's',
    },
    fen: {
      type: 'string',
    },
    divide: {
      type: 'boolean',
      default: false,
    },
    white: {
      type: 'string',
      default: 'medium',
    },
    black: {
      type: 'string',
      default: 'medium',
    },
    difficulty: {
      type: 'string',
      shortFlag: 'd',
      default: 'medium',
    },
    plies: {
      type: 'number',
      default: 200,
    },
    verbose: {
      type: 'boolean',
      shortFlag: 'v',
      default: false,
    },
  },
});

const Difficulty = z.enum(['easy', 'medium', 'hard']);

const FlagsSchema = z.object({
  mode: z.enum(['two-lines', 'one-line', 'three-lines']),
  size: z.number().int().min(3).max(99).optional(),
  fen: z.string().optional(),
  divide: z.boolean(),
  white: Difficulty,
  black: Difficulty,
  difficulty: Difficulty,
  plies: z.number().int().min(1),
  verbose: z.boolean(),
});

type Flags = z.infer<typeof FlagsSchema>;

const OUTCOME_TEXT: Record<Outcome, string> = {
  playing: 'Game in progress',
  white_wins: 'White wins by checkmate',
  black_wins: 'Black wins by checkmate',
  stalemate: 'Draw by stalemate',
  draw_by_clock: 'Draw by the 50-move rule',
};

function fail(message: string): void {
  console.error(chalk.red(`✗ ${message}`));
  process.exitCode = 1;
}

/** Board text with White in yellow and Black in cyan */
function renderBoard(position: Position): string {
  return position
    .ascii()
    .split('\n')
    .map(line => line.replace(/[KQRBNP]/g, ch => chalk.yellow(ch)).replace(/[kqrbnp]/g, ch => chalk.cyan(ch)))
    .join('\n');
}

function boardSize(flags: Flags): number {
  return flags.size ?? loadRuntimeConfig().boardSize;
}

// =============================================================================
// Commands
// =============================================================================

function newCommand(flags: Flags): void {
  const engine = new ChessEngine({ size: 8, setupMode: 'two-lines' });
  const result = engine.newGame(flags.mode, boardSize(flags));
  if (!result.success) {
    fail(result.error);
    return;
  }
  console.log(chalk.bold(`${SETUP_MODE_NAMES[flags.mode]}, ${engine.size()}x${engine.size()}\n`));
  console.log(renderBoard(engine.getPosition()));
  console.log(`\n${engine.exportFen()}`);
}

function fenCommand(fen: string): void {
  const decoded = decodeFen(fen);
  if (!decoded.success) {
    fail(decoded.error);
    return;
  }
  const position = decoded.position;
  console.log(renderBoard(position));
  console.log(`\nSide to move: ${position.sideToMove === 'w' ? 'White' : 'Black'}`);
  console.log(`Legal moves:  ${allLegalMoves(position).length}`);
  console.log(`Status:       ${OUTCOME_TEXT[evaluateOutcome(position)]}`);
}

function perftCommand(depthArg: string | undefined, flags: Flags): void {
  const depth = z.coerce.number().int().min(1).safeParse(depthArg);
  if (!depth.success) {
    fail('Please provide a positive perft depth');
    return;
  }

  let position: Position;
  if (flags.fen) {
    const decoded = decodeFen(flags.fen);
    if (!decoded.success) {
      fail(decoded.error);
      return;
    }
    position = decoded.position;
  } else {
    position = new ChessEngine({ size: boardSize(flags), setupMode: flags.mode }).getPosition();
  }

  const start = Date.now();
  if (flags.divide) {
    let total = 0;
    for (const [move, count] of divide(position, depth.data)) {
      console.log(`${move}: ${count}`);
      total += count;
    }
    console.log(chalk.bold(`\nTotal: ${total}`));
  } else {
    console.log(chalk.bold(`perft(${depth.data}) = ${perft(position, depth.data)}`));
  }
  console.log(chalk.gray(`${Date.now() - start}ms`));
}

async function playCommand(flags: Flags): Promise<void> {
  const white = ChessAI.forDifficulty(flags.white);
  const black = ChessAI.forDifficulty(flags.black);
  const match = new ChessAIMatch(white, black, { size: boardSize(flags), setupMode: flags.mode });

  if (flags.verbose) {
    match.onMoveCallback((state, aiMove) => {
      const last = state.history[state.history.length - 1];
      const tag = aiMove.source === 'random' ? chalk.magenta(' (random)') : '';
      console.log(`${String(state.plyCount).padStart(4)}. ${last}${tag} ${chalk.gray(`[${aiMove.evaluation}]`)}`);
    });
  }

  try {
    console.log(chalk.bold(`White (${flags.white}) vs Black (${flags.black})\n`));
    const result = await match.playGame(flags.plies);
    console.log(`\n${renderBoard(match.getEngine().getPosition())}`);
    console.log(chalk.bold(`\n${OUTCOME_TEXT[result.outcome]} after ${result.plies} plies`));
    console.log(match.getEngine().exportFen());
  } finally {
    await match.dispose();
  }
}

async function bestCommand(fen: string, flags: Flags): Promise<void> {
  let engine: ChessEngine;
  try {
    engine = createChessEngineFromFen(fen);
  } catch (error) {
    fail(error instanceof Error ? error.message : String(error));
    return;
  }

  const ai = ChessAI.forDifficulty(flags.difficulty);
  try {
    const aiMove = await ai.getBestMove(engine.getPosition());
    if (!aiMove) {
      console.log(OUTCOME_TEXT[engine.getOutcome()]);
      return;
    }
    const result = engine.tryMakeMove(aiMove.move.from, aiMove.move.to);
    const promoted = result.ok && result.promotionPending ? engine.completePromotion('q') : result;
    const text = promoted.ok && promoted.notation ? promoted.notation : `${squareName(aiMove.move.from)}${squareName(aiMove.move.to)}`;
    console.log(`${chalk.bold(text)} ${chalk.gray(`(${aiMove.source}, eval ${aiMove.evaluation})`)}`);
  } finally {
    await ai.terminate();
  }
}

// =============================================================================
// Entry
// =============================================================================

async function main(): Promise<void> {
  const [command, ...args] = cli.input;

  if (!command || command === 'help') {
    cli.showHelp();
    return;
  }

  const parsed = FlagsSchema.safeParse(cli.flags);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `--${issue.path.join('.')}: ${issue.message}`);
    fail(`Invalid options\n  ${issues.join('\n  ')}`);
    return;
  }
  const flags = parsed.data;

  switch (command) {
    case 'new':
      newCommand(flags);
      break;
    case 'fen':
      if (!args[0]) fail('Please provide a FEN string');
      else fenCommand(args.join(' '));
      break;
    case 'perft':
      perftCommand(args[0], flags);
      break;
    case 'play':
      await playCommand(flags);
      break;
    case 'best':
      if (!args[0]) fail('Please provide a FEN string');
      else await bestCommand(args.join(' '), flags);
      break;
    default:
      fail(`Unknown command: ${command}`);
      cli.showHelp(1);
  }
}

main().catch(error => {
  console.error(chalk.red('Error:'), error instanceof Error ? error.message : error);
  process.exit(1);
});
