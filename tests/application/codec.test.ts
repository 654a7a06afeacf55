import { describe, it, expect } from 'vitest';
import {
  buildQueueEntry,
  decodeEntry,
  encodeEntry,
  resolveTopic,
  serializeEntry,
} from '../../src/application/index.js';
import { MalformedEntryError } from '../../src/domain/index.js';

describe('decodeEntry', () => {
  it('decodes a producer entry', () => {
    const raw = '{"topic":"devices/1","payload":"{\\"on\\":true}","qos":1,"retain":true,"enqueued_at":1700000000.5}';
    expect(decodeEntry(raw)).toEqual({
      topic: 'devices/1',
      payload: '{"on":true}',
      qos: 1,
      retain: true,
      enqueued_at: 1700000000.5,
    });
  });

  it('applies defaults for retain and enqueued_at', () => {
    expect(decodeEntry('{"topic":"a","payload":"x"}')).toEqual({
      topic: 'a',
      payload: 'x',
      qos: 1,
      retain: false,
      enqueued_at: null,
    });
  });

  it('normalizes any requested qos to 1', () => {
    expect(decodeEntry('{"topic":"a","payload":"x","qos":0}').qos).toBe(1);
    expect(decodeEntry('{"topic":"a","payload":"x","qos":2}').qos).toBe(1);
  });

  it('reads the legacy timestamp field, including ISO strings', () => {
    expect(decodeEntry('{"topic":"a","payload":"x","timestamp":1700000000}').enqueued_at).toBe(1700000000);
    expect(decodeEntry('{"topic":"a","payload":"x","timestamp":"2026-01-01T00:00:00Z"}').enqueued_at).toBe(1767225600);
  });

  it('reads an ISO timestamp without an offset as UTC', () => {
    expect(decodeEntry('{"topic":"t","payload":"p","enqueued_at":"2024-05-01T12:00:00"}').enqueued_at).toBe(1714564800);
  });

  it('keeps the entry when enqueued_at cannot be read', () => {
    expect(decodeEntry('{"topic":"t","payload":"p","enqueued_at":"yesterday"}')).toEqual({
      topic: 't',
      payload: 'p',
      qos: 1,
      retain: false,
      enqueued_at: null,
    });
    expect(decodeEntry('{"topic":"t","payload":"p","enqueued_at":-5}').enqueued_at).toBeNull();
    expect(decodeEntry('{"topic":"t","payload":"p","enqueued_at":{"at":1}}').enqueued_at).toBeNull();
  });

  it('prefers enqueued_at over timestamp', () => {
    expect(decodeEntry('{"topic":"a","payload":"x","enqueued_at":5,"timestamp":9}').enqueued_at).toBe(5);
  });

  it('accepts an empty payload', () => {
    expect(decodeEntry('{"topic":"a","payload":""}').payload).toBe('');
  });

  it('throws MalformedEntryError for invalid JSON, keeping the raw entry', () => {
    let caught: unknown;
    try {
      decodeEntry('not json');
    } catch (err: unknown) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(MalformedEntryError);
    expect(caught).toMatchObject({ message: 'Queue entry is not valid JSON', raw: 'not json', code: 'MALFORMED_ENTRY' });
  });

  it('throws MalformedEntryError when topic or payload is missing', () => {
    expect(() => decodeEntry('{"payload":"x"}')).toThrow('Queue entry failed validation: topic: Required');
    expect(() => decodeEntry('{"topic":"a"}')).toThrow('Queue entry failed validation: payload: Required');
    expect(() => decodeEntry('{"topic":"","payload":"x"}')).toThrow(MalformedEntryError);
  });

  it('throws MalformedEntryError for a topic that cannot be published to', () => {
    expect(() => decodeEntry('{"topic":"a/#","payload":"p"}')).toThrow(
      'Queue entry failed validation: topic: Topic must not contain +, # or NUL',
    );
    expect(() => decodeEntry('{"topic":"sensors/+/temp","payload":"p"}')).toThrow(MalformedEntryError);
    expect(() => decodeEntry('{"topic":"a\\u0000b","payload":"p"}')).toThrow(MalformedEntryError);
  });

  it('throws MalformedEntryError for a non-object entry', () => {
    expect(() => decodeEntry('42')).toThrow(MalformedEntryError);
  });
});

describe('encodeEntry', () => {
  it('publishes the raw payload byte for byte when unsigned', () => {
    const payload = '{"event":"tool_enabled","tool_id":7} ✓';
    const bytes = encodeEntry({ topic: 't', payload, qos: 1, retain: false, enqueued_at: null }, null);
    expect(bytes.equals(Buffer.from(payload, 'utf8'))).toBe(true);
  });
});

describe('serializeEntry / buildQueueEntry', () => {
  it('writes the producer wire form that decodeEntry reads back', () => {
    const entry = buildQueueEntry('devices/1', 'on', { retain: true, now: new Date('2026-01-01T00:00:00Z') });
    const raw = serializeEntry(entry);

    expect(raw).toBe('{"topic":"devices/1","payload":"on","qos":1,"retain":true,"enqueued_at":1767225600}');
    expect(decodeEntry(raw)).toEqual(entry);
  });
});

describe('resolveTopic', () => {
  it('leaves topics alone without a prefix', () => {
    expect(resolveTopic('devices/1', '')).toBe('devices/1');
  });

  it('prepends the prefix', () => {
    expect(resolveTopic('devices/1', 'site')).toBe('site/devices/1');
    expect(resolveTopic('/devices/1', 'site/')).toBe('site/devices/1');
  });

  it('does not double-prefix', () => {
    expect(resolveTopic('site/devices/1', 'site')).toBe('site/devices/1');
    expect(resolveTopic('site', 'site')).toBe('site');
    expect(resolveTopic('siteB/x', 'site')).toBe('site/siteB/x');
  });
});
