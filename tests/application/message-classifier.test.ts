import { describe, it, expect } from 'vitest';
import { classify, findThreadedMessage } from '../../src/application/message-classifier.js';
import { decodeCallbackEvent } from '../../src/application/envelope-decoder.js';
import { fakeLogger, loadPayloadFixture } from '../helpers.js';

describe('classify', () => {
  it('returns the reply ts, not thread_ts, for a threaded plain message', () => {
    const event = decodeCallbackEvent({ type: 'message', channel: 'C1', ts: '1.1', thread_ts: '0.1' });
    expect(classify(event)).toEqual({ channel: 'C1', message_ts: '1.1' });
  });

  it('returns null for a plain message outside a thread', () => {
    const event = decodeCallbackEvent({ type: 'message', channel: 'C1', ts: '1.1' });
    expect(classify(event)).toBeNull();
  });

  it('accepts a threaded file_share message like a plain one', () => {
    const event = decodeCallbackEvent({
      type: 'message',
      subtype: 'file_share',
      channel: 'C1',
      ts: '2.2',
      thread_ts: '0.1',
    });
    expect(classify(event)).toEqual({ channel: 'C1', message_ts: '2.2' });
  });

  it('returns null for a file_share message outside a thread', () => {
    const event = decodeCallbackEvent({ type: 'message', subtype: 'file_share', channel: 'C1', ts: '2.2' });
    expect(classify(event)).toBeNull();
  });

  it.each(['message_changed', 'message_deleted', 'thread_broadcast', 'bot_message', 'channel_join'])(
    'returns null for subtype %s regardless of thread_ts',
    (subtype) => {
      const threaded = decodeCallbackEvent({ type: 'message', subtype, channel: 'C1', ts: '3.3', thread_ts: '0.1' });
      const unthreaded = decodeCallbackEvent({ type: 'message', subtype, channel: 'C1', ts: '3.3' });
      expect(classify(threaded)).toBeNull();
      expect(classify(unthreaded)).toBeNull();
    },
  );

  it('returns null for non-message events', () => {
    const event = decodeCallbackEvent({ type: 'reaction_added', reaction: 'eyes' });
    expect(classify(event)).toBeNull();
  });

  it('gives the same answer on repeated calls', () => {
    const event = decodeCallbackEvent({ type: 'message', channel: 'C9', ts: '5.5', thread_ts: '5.0' });
    const first = classify(event);
    const second = classify(event);
    expect(second).toEqual(first);
    expect(first).toEqual({ channel: 'C9', message_ts: '5.5' });
  });

  it('logs why a message was skipped', () => {
    const log = fakeLogger();
    classify(decodeCallbackEvent({ type: 'message', channel: 'C1', ts: '1.1' }), log);
    expect(log.info).toHaveBeenCalledWith(
      { channel: 'C1', ts: '1.1' },
      'Not a threaded message: thread_ts is absent',
    );
  });

  it('logs skipped subtypes and non-message events at info', () => {
    const log = fakeLogger();
    classify(decodeCallbackEvent({ type: 'message', subtype: 'message_changed' }), log);
    classify(decodeCallbackEvent({ type: 'reaction_added' }), log);

    expect(log.info).toHaveBeenCalledWith(
      { subtype: 'message_changed' },
      'Not a threaded message: subtype is present',
    );
    expect(log.info).toHaveBeenCalledWith({ type: 'reaction_added' }, 'Ignoring non-message event');
    expect(log.debug).not.toHaveBeenCalled();
  });
});

describe('findThreadedMessage (fixtures)', () => {
  it('ignores a top-level message', () => {
    expect(findThreadedMessage(loadPayloadFixture('plain_message.json'))).toBeNull();
  });

  it('finds a reply inside a thread', () => {
    expect(findThreadedMessage(loadPayloadFixture('threaded_message.json'))).toEqual({
      channel: 'C0TEST0001',
      message_ts: '1700000100.000200',
    });
  });

  it('ignores an edit of a threaded reply', () => {
    expect(findThreadedMessage(loadPayloadFixture('threaded_message_changed.json'))).toBeNull();
  });

  it('ignores a reply broadcast to the channel', () => {
    expect(findThreadedMessage(loadPayloadFixture('broadcasted_threaded_message.json'))).toBeNull();
    expect(findThreadedMessage(loadPayloadFixture('broadcasted_threaded_message_changed.json'))).toBeNull();
  });

  it('finds a file uploaded inside a thread', () => {
    expect(findThreadedMessage(loadPayloadFixture('threaded_file_upload.json'))).toEqual({
      channel: 'C0TEST0001',
      message_ts: '1700000500.000600',
    });
  });

  it('ignores a file upload broadcast to the channel', () => {
    expect(findThreadedMessage(loadPayloadFixture('broadcasted_threaded_file_upload.json'))).toBeNull();
  });

  it('ignores non-message callback events', () => {
    expect(findThreadedMessage(loadPayloadFixture('app_home_opened.json'))).toBeNull();
  });

  it('ignores payloads that are not event callbacks', () => {
    const log = fakeLogger();
    expect(findThreadedMessage(loadPayloadFixture('rate_limited.json'), log)).toBeNull();
    expect(log.info).toHaveBeenCalledWith(
      { type: 'app_rate_limited' },
      'Ignoring non event_callback payload',
    );
  });

  it('scopes the classification log to the event id', () => {
    const log = fakeLogger();
    findThreadedMessage(loadPayloadFixture('threaded_message.json'), log);
    expect(log.child).toHaveBeenCalledWith({ event_id: 'Ev0THREAD001' });
  });
});
