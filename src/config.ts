/**
 * Runtime configuration from environment variables
 *
 * CHESSGRID_BOARD_SIZE  default board size for new games (3-99)
 * CHESSGRID_AI_WORKER   '0'/'false' keeps the AI search on the main thread
 */

import { z } from 'zod';
import { DEFAULT_BOARD_SIZE, MAX_BOARD_SIZE, MIN_BOARD_SIZE } from './chess/types.js';

const EnvSchema = z.object({
  CHESSGRID_BOARD_SIZE: z.coerce.number().int().min(MIN_BOARD_SIZE).max(MAX_BOARD_SIZE).optional(),
  CHESSGRID_AI_WORKER: z.enum(['0', '1', 'true', 'false']).optional(),
});

export interface RuntimeConfig {
  boardSize: number;
  useWorker: boolean;
}

export const DEFAULT_RUNTIME_CONFIG: RuntimeConfig = {
  boardSize: DEFAULT_BOARD_SIZE,
  useWorker: true,
};

/**
 * Read the environment once; invalid values are reported and ignored
 */
export function loadRuntimeConfig(env: Record<string, string | undefined> = process.env): RuntimeConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map(issue => issue.path.join('.')).join(', ');
    console.warn(`Ignoring invalid chessgrid environment settings: ${fields}`);
    return { ...DEFAULT_RUNTIME_CONFIG };
  }

  const { CHESSGRID_BOARD_SIZE, CHESSGRID_AI_WORKER } = parsed.data;
  return {
    boardSize: CHESSGRID_BOARD_SIZE ?? DEFAULT_RUNTIME_CONFIG.boardSize,
    useWorker:
      CHESSGRID_AI_WORKER === undefined
        ? DEFAULT_RUNTIME_CONFIG.useWorker
        : CHESSGRID_AI_WORKER === '1' || CHESSGRID_AI_WORKER === 'true',
  };
}
