export {
  CorrectionLoop,
  InMemoryAttemptLog,
  stripCodeFences,
  type CorrectionLoopOptions,
} from './correction-loop.js';
