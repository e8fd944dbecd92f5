/**
 * ChessTranscript - lossless board snapshot for remote peers
 *
 * Records are `file,rank,<color><TYPE>,<moved>` joined by ';', e.g.
 * `4,0,wK,0;4,7,bK,1`. Unlike FEN this keeps every piece's moved flag.
 */

import { z } from 'zod';
import { Position, createPiece } from './ChessPosition.js';
import type { PieceType } from './types.js';

export type TranscriptResult = { success: true; position: Position } | { success: false; error: string };

const TYPE_CODES: Record<PieceType, string> = {
  k: 'K',
  q: 'Q',
  r: 'R',
  b: 'B',
  n: 'N',
  p: 'P',
};

const Coordinate = z
  .string()
  .regex(/^\d+$/, 'must be a non-negative integer')
  .transform(value => Number.parseInt(value, 10));

export const TranscriptRecordSchema = z.object({
  file: Coordinate,
  rank: Coordinate,
  color: z.enum(['w', 'b']),
  type: z.enum(['K', 'Q', 'R', 'B', 'N', 'P']),
  moved: z.enum(['0', '1']),
});

export type TranscriptRecord = z.infer<typeof TranscriptRecordSchema>;

/**
 * Serialize every piece, file by file
 */
export function encodeTranscript(position: Position): string {
  const records: string[] = [];
  for (let file = 0; file < position.size; file++) {
    for (let rank = 0; rank < position.size; rank++) {
      const piece = position.at(file, rank);
      if (!piece) continue;
      records.push(`${file},${rank},${piece.color}${TYPE_CODES[piece.type]},${piece.hasMoved ? 1 : 0}`);
    }
  }
  return records.join(';');
}

/**
 * Rebuild a board of the given size. Empty records are skipped; anything
 * else that does not parse fails the whole transcript.
 */
export function decodeTranscript(text: string, size: number): TranscriptResult {
  let position: Position;
  try {
    position = new Position(size);
  } catch (error) {
    return { success: false, error: error instanceof Error ? error.message : String(error) };
  }

  const records = text.split(';');
  for (let i = 0; i < records.length; i++) {
    const raw = records[i].trim();
    if (raw.length === 0) continue;

    const tokens = raw.split(',');
    const code = tokens.length > 2 ? tokens[2] : '';
    const parsed = TranscriptRecordSchema.safeParse({
      file: tokens[0],
      rank: tokens[1],
      color: code.charAt(0),
      type: code.slice(1),
      moved: tokens[3],
    });
    if (!parsed.success || tokens.length !== 4) {
      const reason = parsed.success ? 'expected 4 fields' : parsed.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`).join(', ');
      return { success: false, error: `Bad record ${i + 1} '${raw}': ${reason}` };
    }

    const { file, rank, color, type, moved } = parsed.data;
    if (!position.inBounds(file, rank)) {
      return { success: false, error: `Bad record ${i + 1} '${raw}': square is off a ${size}x${size} board` };
    }
    if (position.at(file, rank)) {
      return { success: false, error: `Bad record ${i + 1} '${raw}': square already occupied` };
    }

    const pieceType = type.toLowerCase();
    if (!isPieceType(pieceType)) {
      return { success: false, error: `Bad record ${i + 1} '${raw}': unknown piece` };
    }
    position.set({ file, rank }, createPiece(pieceType, color, moved === '1'));
  }

  return { success: true, position };
}

function isPieceType(value: string): value is PieceType {
  return value === 'k' || value === 'q' || value === 'r' || value === 'b' || value === 'n' || value === 'p';
}
