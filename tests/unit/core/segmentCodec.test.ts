import { describe, it, expect } from 'vitest';
import { SegmentCodec, partFromOneBot } from '../../../src/core/segment/SegmentCodec.js';
import { createMockLogger, messages } from '../helpers.js';

describe('SegmentCodec', () => {
  it('should keep part order and stringify numeric payloads', () => {
    const logger = createMockLogger();
    const codec = new SegmentCodec(logger);

    const segments = codec.decompose([
      { kind: 'text', payload: 'hello ' },
      { kind: 'at', payload: 10001 },
      { kind: 'image', payload: 'abc.jpg' },
      { kind: 'reply', payload: '42' },
    ]);

    expect(segments).toEqual([
      { kind: 'text', content: 'hello ' },
      { kind: 'at', content: '10001' },
      { kind: 'image', content: 'abc.jpg' },
      { kind: 'reply', content: '42' },
    ]);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it('should skip unknown kinds with a warning and keep the rest', () => {
    const logger = createMockLogger();
    const codec = new SegmentCodec(logger);

    const segments = codec.decompose([
      { kind: 'face', payload: '1' },
      { kind: 'text', payload: 'still here' },
    ]);

    expect(segments).toEqual([{ kind: 'text', content: 'still here' }]);
    expect(messages(logger.warn)).toEqual(['Skip segment of unknown kind "face"']);
  });

  it('should skip parts whose payload is not a string or number', () => {
    const logger = createMockLogger();
    const codec = new SegmentCodec(logger);

    const segments = codec.decompose([
      { kind: 'image', payload: undefined },
      { kind: 'text', payload: { nested: true } },
      { kind: 'text', payload: Number.NaN },
    ]);

    expect(segments).toEqual([]);
    expect(messages(logger.warn)).toEqual([
      'Skip image segment with malformed payload: undefined',
      'Skip text segment with malformed payload: {"nested":true}',
      'Skip text segment with malformed payload: null',
    ]);
  });

  it('should reject an at target that is not an integer', () => {
    const logger = createMockLogger();
    const codec = new SegmentCodec(logger);

    const segments = codec.decompose([
      { kind: 'at', payload: 'all' },
      { kind: 'at', payload: ' 123 ' },
    ]);

    expect(segments).toEqual([{ kind: 'at', content: '123' }]);
    expect(messages(logger.warn)).toEqual(['Skip at segment whose target is not an integer: all']);
  });

  it('should return nothing for an empty message', () => {
    const codec = new SegmentCodec(createMockLogger());
    expect(codec.decompose([])).toEqual([]);
  });
});

describe('partFromOneBot', () => {
  it('should read the payload field of each kind', () => {
    expect(partFromOneBot({ type: 'text', data: { text: 'hi' } })).toEqual({
      kind: 'text',
      payload: 'hi',
    });
    expect(partFromOneBot({ type: 'image', data: { file: 'a.png', url: 'http://x' } })).toEqual({
      kind: 'image',
      payload: 'a.png',
    });
    expect(partFromOneBot({ type: 'at', data: { qq: '10001' } })).toEqual({
      kind: 'at',
      payload: '10001',
    });
    expect(partFromOneBot({ type: 'share', data: { url: 'https://example.com' } })).toEqual({
      kind: 'share',
      payload: 'https://example.com',
    });
  });

  it('should leave the payload undefined for unknown kinds', () => {
    expect(partFromOneBot({ type: 'face', data: { id: '1' } })).toEqual({
      kind: 'face',
      payload: undefined,
    });
  });
});
