import { parentPort } from 'node:worker_threads';
import { handleSearchMessage } from './searchTask.js';

// Ensure we have a parent port to communicate with
if (!parentPort) {
  throw new Error('This file must be run as a worker thread');
}

const port = parentPort;

port.on('message', (message: unknown) => {
  port.postMessage(handleSearchMessage(message));
});
