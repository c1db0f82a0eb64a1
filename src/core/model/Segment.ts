export const SEGMENT_KINDS = [
  'text',
  'image',
  'record',
  'video',
  'share',
  'at',
  'reply',
  'contact',
  'forward',
  'node',
] as const;

export type SegmentKind = (typeof SEGMENT_KINDS)[number];

export function isSegmentKind(value: string): value is SegmentKind {
  return SEGMENT_KINDS.some((kind) => kind === value);
}

/**
 * One typed fragment of a group message, as persisted. Immutable once written.
 */
export interface Segment {
  messageId: number;
  /** "YYYY-MM-DD HH:mm:ss"; repeats across segments of one message */
  timestamp: string;
  senderId: number;
  senderName: string;
  kind: SegmentKind;
  content: string;
  interpretation: string;
}

/** One part of an inbound message before decomposition. */
export interface MessagePart {
  kind: string;
  payload: unknown;
}

/** Output of the codec: a recognised kind with its textual payload. */
export interface DecodedSegment {
  kind: SegmentKind;
  content: string;
}

/** Sender name and interpretation marking a recall tombstone. */
export const RECALL_INDICATOR = 'RECALL_INDICATOR';
