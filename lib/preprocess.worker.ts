import { parentPort } from 'node:worker_threads';
import { analyzeRaster, parseAnalysisTask } from './analyze';

if (!parentPort) {
  throw new Error('preprocess.worker must be started as a worker thread');
}

const port = parentPort;

port.on('message', (message: unknown) => {
  port.postMessage(analyzeRaster(parseAnalysisTask(message)));
});
