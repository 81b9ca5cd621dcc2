export {
  DecodeError,
  decodeInboundEvent,
  decodeEventsApiPayload,
  decodeCallbackEvent,
  decodeMessageEvent,
  encodeAcknowledgment,
} from './envelope-decoder.js';
export { classify, findThreadedMessage } from './message-classifier.js';
export { ReactionSequencer, ReactionError } from './reaction-sequencer.js';
export type { ReactionOutcome, ReactionStep } from './reaction-sequencer.js';
export { RelayStatus } from './relay-status.js';
export type { RelayState, RelayStatusSnapshot } from './relay-status.js';
