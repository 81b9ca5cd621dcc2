export type {
  InboundEvent,
  EventsApiPayload,
  CallbackEvent,
  CommonMessageFields,
  MessageEvent,
  ThreadReference,
  Acknowledgment,
} from './slack-event.js';
