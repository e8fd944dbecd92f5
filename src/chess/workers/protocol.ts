/**
 * Messages between ChessAI and the search worker
 *
 * Positions cross the thread boundary as a transcript plus turn state, so
 * moved flags and the en-passant target survive the trip. The worker sends
 * back every root move sharing the best score and the caller picks one with
 * its own random source.
 */

import { z } from 'zod';
import type { Position } from '../ChessPosition.js';
import type { ChessSearch } from '../ChessSearch.js';
import { pickTiedMove } from '../ChessSearch.js';
import { decodeTranscript, encodeTranscript } from '../ChessTranscript.js';
import type { SearchResult } from '../types.js';

const SquareSchema = z.object({
  file: z.number().int().min(0),
  rank: z.number().int().min(0),
});

const MoveSchema = z.object({ from: SquareSchema, to: SquareSchema });

export const PositionSnapshotSchema = z.object({
  size: z.number().int(),
  pieces: z.string(),
  sideToMove: z.enum(['w', 'b']),
  enPassant: SquareSchema.nullable(),
  halfMoveClock: z.number().int().min(0),
  fullMoveNumber: z.number().int().min(1),
  plyCount: z.number().int().min(0),
  setupMode: z.enum(['two-lines', 'one-line', 'three-lines', 'custom']),
  pawnFirstMoveDistance: z.number().int().min(1),
});

export type PositionSnapshot = z.infer<typeof PositionSnapshotSchema>;

export const SearchRequestSchema = z.object({
  type: z.literal('SEARCH'),
  position: PositionSnapshotSchema,
  depth: z.number().int().min(1),
});

export type SearchRequest = z.infer<typeof SearchRequestSchema>;

export const WorkerResponseSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('RESULT'),
    score: z.number(),
    depth: z.number(),
    nodes: z.number(),
    time: z.number(),
    tiedMoves: z.array(MoveSchema),
  }),
  z.object({
    type: z.literal('ERROR'),
    error: z.string(),
  }),
]);

export type WorkerResponse = z.infer<typeof WorkerResponseSchema>;

export function toSnapshot(position: Position): PositionSnapshot {
  return {
    size: position.size,
    pieces: encodeTranscript(position),
    sideToMove: position.sideToMove,
    enPassant: position.enPassant ? { ...position.enPassant } : null,
    halfMoveClock: position.halfMoveClock,
    fullMoveNumber: position.fullMoveNumber,
    plyCount: position.plyCount,
    setupMode: position.setupMode,
    pawnFirstMoveDistance: position.pawnFirstMoveDistance,
  };
}

/**
 * Rebuild a position; throws when the snapshot's pieces do not decode
 */
export function fromSnapshot(snapshot: PositionSnapshot): Position {
  const decoded = decodeTranscript(snapshot.pieces, snapshot.size);
  if (!decoded.success) {
    throw new Error(`Invalid position snapshot: ${decoded.error}`);
  }
  const position = decoded.position;
  position.sideToMove = snapshot.sideToMove;
  position.enPassant = snapshot.enPassant;
  position.halfMoveClock = snapshot.halfMoveClock;
  position.fullMoveNumber = snapshot.fullMoveNumber;
  position.plyCount = snapshot.plyCount;
  position.setupMode = snapshot.setupMode;
  position.pawnFirstMoveDistance = snapshot.pawnFirstMoveDistance;
  return position;
}

// =============================================================================
// Request Handling
// =============================================================================

/**
 * Worker side: validate a request, search it and build the reply.
 * Failures become ERROR replies.
 */
export function handleSearchRequest(raw: unknown, search: ChessSearch): WorkerResponse {
  try {
    const task = SearchRequestSchema.parse(raw);
    const result = search.search(fromSnapshot(task.position), task.depth);
    return {
      type: 'RESULT',
      score: result.score,
      depth: result.depth,
      nodes: result.nodes,
      time: result.time,
      tiedMoves: result.tiedMoves,
    };
  } catch (error) {
    return {
      type: 'ERROR',
      error: error instanceof Error ? error.message : String(error),
    };
  }
}

/**
 * Caller side: turn a RESULT reply into a search result, choosing among
 * the tied moves with `random`
 */
export function toSearchResult(
  response: Extract<WorkerResponse, { type: 'RESULT' }>,
  random: () => number
): SearchResult {
  return {
    bestMove: pickTiedMove(response.tiedMoves, random),
    score: response.score,
    depth: response.depth,
    nodes: response.nodes,
    time: response.time,
    tiedMoves: response.tiedMoves,
  };
}
