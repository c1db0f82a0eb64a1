import type { Logger } from '../../infra/logger/logger.js';
import {
  isSegmentKind,
  type DecodedSegment,
  type MessagePart,
  type SegmentKind,
} from '../model/Segment.js';

/** OneBot `data` field carrying the payload of each segment kind. */
export const PAYLOAD_FIELDS: Readonly<Record<SegmentKind, string>> = {
  text: 'text',
  image: 'file',
  record: 'file',
  video: 'file',
  at: 'qq',
  share: 'url',
  reply: 'id',
  contact: 'id',
  forward: 'id',
  node: 'id',
};

/**
 * Project a raw OneBot segment `{type, data}` onto a message part.
 * Unknown kinds keep an undefined payload; the codec reports them.
 */
export function partFromOneBot(segment: { type: string; data: Record<string, unknown> }): MessagePart {
  const field = isSegmentKind(segment.type) ? PAYLOAD_FIELDS[segment.type] : undefined;
  return {
    kind: segment.type,
    payload: field === undefined ? undefined : segment.data[field],
  };
}

function payloadText(payload: unknown): string | null {
  if (typeof payload === 'string') return payload;
  if (typeof payload === 'number' && Number.isFinite(payload)) return String(payload);
  return null;
}

/**
 * Decomposes a multi-part message into ordered (kind, content) pairs.
 * A bad part is skipped with a warning; the rest of the message always survives.
 */
export class SegmentCodec {
  constructor(private readonly logger: Logger) {}

  decompose(parts: readonly MessagePart[]): DecodedSegment[] {
    const segments: DecodedSegment[] = [];
    for (const part of parts) {
      const segment = this.decodePart(part);
      if (segment) segments.push(segment);
    }
    return segments;
  }

  private decodePart(part: MessagePart): DecodedSegment | null {
    if (!isSegmentKind(part.kind)) {
      this.logger.warn('segment-codec', `Skip segment of unknown kind "${part.kind}"`);
      return null;
    }
    const content = payloadText(part.payload);
    if (content === null) {
      this.logger.warn(
        'segment-codec',
        `Skip ${part.kind} segment with malformed payload: ${JSON.stringify(part.payload) ?? 'undefined'}`,
      );
      return null;
    }
    if (part.kind === 'at' && !/^-?\d+$/.test(content.trim())) {
      this.logger.warn('segment-codec', `Skip at segment whose target is not an integer: ${content}`);
      return null;
    }
    return { kind: part.kind, content: part.kind === 'at' ? content.trim() : content };
  }
}
