export {
  type PollOptions,
  type Probe,
  type ProbeResult,
  type WaitOutcome,
  waitUntilReady,
  waitUntilReadyOrThrow,
} from './poller.js';
