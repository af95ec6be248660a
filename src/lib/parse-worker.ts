import { parentPort } from 'node:worker_threads';
import { handleParseRequest } from './parse-job.js';

if (!parentPort) {
  throw new Error('parse-worker must be started as a worker thread');
}

const port = parentPort;
port.once('message', (message: unknown) => {
  port.postMessage(handleParseRequest(message));
});
