import { parentPort } from 'worker_threads';
import { ChessSearch } from '../ChessSearch.js';
import { handleSearchRequest } from './protocol.js';

// Ensure we have a parent port to communicate with
if (!parentPort) {
  throw new Error('This file must be run as a worker thread');
}

const port = parentPort;
// Tie-breaks happen on the caller's side
const search = new ChessSearch(undefined, { random: () => 0 });

port.on('message', (raw: unknown) => {
  // Synchronous, but off the caller's thread
  port.postMessage(handleSearchRequest(raw, search));
});
