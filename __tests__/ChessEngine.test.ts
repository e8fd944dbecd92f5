/**
 * Stateful game: moves, promotion, notation, draws and loading
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ChessEngine, createChessEngine, createChessEngineFromFen, toPromotionType } from '../src/chess/ChessEngine.js';
import { Position } from '../src/chess/ChessPosition.js';
import { SetupError } from '../src/chess/errors.js';
import { place, sq } from './fixtures.js';

function engineAt(fen: string): ChessEngine {
  return createChessEngineFromFen(fen, { random: () => 0 });
}

describe('ChessEngine', () => {
  describe('Construction', () => {
    it('defaults to a 26x26 Two Lines game', () => {
      const engine = createChessEngine();
      const state = engine.getState();
      expect(state.size).toBe(26);
      expect(state.setupMode).toBe('two-lines');
      expect(state.sideToMove).toBe('w');
      expect(state.outcome).toBe('playing');
      expect(state.fen.startsWith('26:')).toBe(true);
    });

    it('throws SetupError for a board too small for the layout', () => {
      expect(() => new ChessEngine({ size: 4, setupMode: 'two-lines' })).toThrow(SetupError);
      expect(() => new ChessEngine({ size: 4, setupMode: 'two-lines' })).toThrow(
        'Two Lines needs a board size in [6, 99], got 4'
      );
    });

    it('throws SetupError for an unreadable FEN', () => {
      expect(() => createChessEngineFromFen('not a fen')).toThrow(SetupError);
    });
  });

  describe('Moves', () => {
    let engine: ChessEngine;

    beforeEach(() => {
      engine = new ChessEngine({ size: 8, setupMode: 'two-lines' });
    });

    it('lists legal destinations for the side to move only', () => {
      expect(engine.getLegalMoves(sq('e3')).length).toBe(2);
      expect(engine.getLegalMoves(sq('e6'))).toEqual([]);
      expect(engine.getLegalMoves({ file: 20, rank: 0 })).toEqual([]);
    });

    it('refuses illegal and off-board moves without changing the game', () => {
      const fen = engine.exportFen();
      expect(engine.tryMakeMove(sq('e3'), sq('e6'))).toEqual({ ok: false, reason: 'illegal_move' });
      expect(engine.tryMakeMove(sq('e6'), sq('e5'))).toEqual({ ok: false, reason: 'illegal_move' });
      expect(engine.tryMakeMove({ file: -1, rank: 0 }, sq('a1'))).toEqual({ ok: false, reason: 'illegal_move' });
      expect(engine.exportFen()).toBe(fen);
      expect(engine.history()).toEqual([]);
    });

    it('plays a move and hands over the turn', () => {
      const result = engine.tryMakeMove(sq('e3'), sq('e5'));
      expect(result).toEqual({
        ok: true,
        notation: 'e5',
        promotionPending: false,
        sideToMove: 'b',
        check: false,
        outcome: 'playing',
        captured: null,
      });
      expect(engine.turn()).toBe('b');
      expect(engine.history()).toEqual(['e5']);
    });

    it('restarts from the start position on reset', () => {
      const start = engine.exportFen();
      engine.tryMakeMove(sq('e3'), sq('e5'));
      engine.reset();
      expect(engine.exportFen()).toBe(start);
      expect(engine.history()).toEqual([]);
    });
  });

  describe('Promotion', () => {
    const FEN = '8:4k3/P7/8/8/8/8/8/4K3 w - - 0 1';

    it('waits for a piece choice before switching sides', () => {
      const engine = engineAt(FEN);
      const result = engine.tryMakeMove(sq('a7'), sq('a8'));

      expect(result).toEqual({
        ok: true,
        notation: null,
        promotionPending: true,
        sideToMove: 'w',
        check: false,
        outcome: 'playing',
        captured: null,
      });
      expect(engine.turn()).toBe('w');
      expect(engine.getPendingPromotion()?.to).toEqual(sq('a8'));
      expect(engine.getLegalMoves(sq('e1'))).toEqual([]);
      expect(engine.tryMakeMove(sq('e1'), sq('d1'))).toEqual({ ok: false, reason: 'promotion_pending' });
    });

    it('completes with the chosen piece', () => {
      const engine = engineAt(FEN);
      engine.tryMakeMove(sq('a7'), sq('a8'));
      const result = engine.completePromotion('queen');

      expect(result.ok && result.notation).toBe('a8=Q+');
      expect(result.ok && result.check).toBe(true);
      expect(engine.turn()).toBe('b');
      expect(engine.getPendingPromotion()).toBeNull();
      expect(engine.getState().halfMoveClock).toBe(0);
      expect(engine.history()).toEqual(['a8=Q+']);
    });

    it('allows underpromotion', () => {
      const engine = engineAt(FEN);
      engine.tryMakeMove(sq('a7'), sq('a8'));
      const result = engine.completePromotion('n');
      expect(result.ok && result.notation).toBe('a8=N');
      expect(engine.getPosition().get(sq('a8'))?.type).toBe('n');
    });

    it('reports when nothing is waiting', () => {
      expect(engineAt(FEN).completePromotion('q')).toEqual({ ok: false, reason: 'no_promotion_pending' });
    });

    it('maps choices to promotion pieces', () => {
      expect(toPromotionType('Rook')).toBe('r');
      expect(toPromotionType('b')).toBe('b');
      expect(toPromotionType('king')).toBe('q');
      expect(toPromotionType('')).toBe('q');
      expect(toPromotionType('constructor')).toBe('q');
      expect(toPromotionType('__proto__')).toBe('q');
      expect(toPromotionType('toString')).toBe('q');
    });

    it('promotes to a queen for names found on every object', () => {
      const engine = engineAt(FEN);
      engine.tryMakeMove(sq('a7'), sq('a8'));
      const result = engine.completePromotion('constructor');

      expect(result.ok && result.notation).toBe('a8=Q+');
      expect(engine.getPosition().get(sq('a8'))).toEqual({ type: 'q', color: 'w', hasMoved: true });
    });
  });

  describe('Notation', () => {
    it('writes castling', () => {
      const kingSide = engineAt('8:4k3/8/8/8/8/8/8/R3K2R w KQ - 0 1');
      const short = kingSide.tryMakeMove(sq('e1'), sq('g1'));
      expect(short.ok && short.notation).toBe('O-O');
      expect(kingSide.getPosition().get(sq('f1'))?.type).toBe('r');

      const queenSide = engineAt('8:4k3/8/8/8/8/8/8/R3K2R w KQ - 0 1');
      const long = queenSide.tryMakeMove(sq('e1'), sq('c1'));
      expect(long.ok && long.notation).toBe('O-O-O');
    });

    it('disambiguates by file, then rank', () => {
      const knights = engineAt('8:4k3/8/8/8/8/8/8/1N2KN2 w - - 0 1');
      const byFile = knights.tryMakeMove(sq('b1'), sq('d2'));
      expect(byFile.ok && byFile.notation).toBe('Nbd2');

      const rooks = engineAt('8:4k3/8/8/R7/8/8/8/R3K3 w - - 0 1');
      const byRank = rooks.tryMakeMove(sq('a1'), sq('a3'));
      expect(byRank.ok && byRank.notation).toBe('R1a3');
    });

    it('writes pawn captures and records captured pieces', () => {
      const engine = engineAt('8:4k3/8/8/3p4/4P3/8/8/4K3 w - - 0 1');
      const result = engine.tryMakeMove(sq('e4'), sq('d5'));
      expect(result.ok && result.notation).toBe('exd5');
      expect(result.ok && result.captured).toBe('p');
      expect(engine.getCapturedPieces()).toEqual({ white: ['p'], black: [] });
    });

    it('marks checkmate', () => {
      const engine = engineAt('8:7k/8/6K1/8/8/8/8/1Q6 w - - 0 1');
      const result = engine.tryMakeMove(sq('b1'), sq('b8'));
      expect(result.ok && result.notation).toBe('Qb8#');
      expect(result.ok && result.outcome).toBe('white_wins');
      expect(engine.isGameOver()).toBe(true);
    });
  });

  describe('Draws', () => {
    it('draws after 100 half-moves of knight shuffling', () => {
      const engine = engineAt('8:1n2k3/8/8/8/8/8/8/1N2K3 w - - 0 1');
      const cycle: Array<[string, string]> = [
        ['b1', 'c3'],
        ['b8', 'c6'],
        ['c3', 'b1'],
        ['c6', 'b8'],
      ];

      for (let ply = 0; ply < 100; ply++) {
        expect(engine.getOutcome()).toBe('playing');
        const [from, to] = cycle[ply % cycle.length];
        const result = engine.tryMakeMove(sq(from), sq(to));
        expect(result.ok).toBe(true);
      }

      expect(engine.getState().halfMoveClock).toBe(100);
      expect(engine.getOutcome()).toBe('draw_by_clock');
    });
  });

  describe('Loading', () => {
    it('keeps the current game when a FEN is rejected', () => {
      const engine = new ChessEngine({ size: 8, setupMode: 'two-lines' });
      const fen = engine.exportFen();
      expect(engine.importFen('garbage')).toEqual({ success: false, error: 'Expected 8 ranks, got 1' });
      expect(engine.exportFen()).toBe(fen);
    });

    it('keeps the current game when a new layout does not fit', () => {
      const engine = new ChessEngine({ size: 8, setupMode: 'two-lines' });
      expect(engine.newGame('three-lines', 6).success).toBe(false);
      expect(engine.size()).toBe(8);
      expect(engine.newGame('three-lines', 10)).toEqual({ success: true });
      expect(engine.size()).toBe(10);
    });

    it('starts from a hand-placed position', () => {
      const engine = new ChessEngine({ size: 8, setupMode: 'two-lines' });
      const position = new Position(5);
      place(position, 'a1', 'k', 'w');
      place(position, 'e5', 'k', 'b');
      place(position, 'c3', 'p', 'b');

      expect(engine.loadCustom(position, 'b')).toEqual({ success: true });
      expect(engine.size()).toBe(5);
      expect(engine.turn()).toBe('b');
      expect(engine.getState().setupMode).toBe('custom');
      expect(engine.getPosition()).not.toBe(position);
    });

    it('keeps the current game when a hand-placed position is invalid', () => {
      const engine = new ChessEngine({ size: 8, setupMode: 'two-lines' });
      const position = new Position(5);
      place(position, 'a1', 'k', 'w');
      expect(engine.loadCustom(position)).toEqual({ success: false, error: 'Black has no pieces' });
      expect(engine.size()).toBe(8);
    });

    it('round-trips a game through a transcript', () => {
      const engine = new ChessEngine({ size: 8, setupMode: 'two-lines' });
      engine.tryMakeMove(sq('e3'), sq('e5'));
      const transcript = engine.exportTranscript();

      const peer = new ChessEngine({ size: 8, setupMode: 'two-lines' });
      expect(peer.importTranscript(transcript, 'b')).toEqual({ success: true });
      expect(peer.turn()).toBe('b');
      expect(peer.getPosition().get(sq('e5'))).toEqual({ type: 'p', color: 'w', hasMoved: true });
      expect(peer.exportTranscript()).toBe(transcript);
    });

    it('validates an imported transcript', () => {
      const engine = new ChessEngine({ size: 8, setupMode: 'two-lines' });
      expect(engine.importTranscript('0,0,wK,0')).toEqual({ success: false, error: 'Black has no pieces' });
    });
  });
});
