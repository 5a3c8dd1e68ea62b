import type { Fraction } from './fraction.js';
import type { NotationToken } from './notation.js';

/** Time signature as beats per bar over a power-of-two beat unit. */
export interface TimeSignature {
  readonly beats: number;
  readonly beatUnit: number;
}

/** Key, meter, tempo and swing shared by every bar that references it. */
export interface Signature {
  /** Key index, see `key-signature.ts` (0 = C, odd values are quarter-tone keys). */
  readonly key: number;
  readonly time: TimeSignature;
  /** Beats per minute. */
  readonly tempo: number;
  /** Swing percentage, 50 = straight. */
  readonly swing: number;
}

/** Caller-supplied signature record; `swing` defaults to 50. */
export interface SignatureInput {
  key: number;
  time: TimeSignature;
  tempo: number;
  swing?: number;
}

/** Repeat and navigation markers attached to a bar. */
export type RepeatMarker =
  | { readonly kind: 'open' }
  | { readonly kind: 'close' }
  | { readonly kind: 'segno' }
  | { readonly kind: 'dc' }
  | { readonly kind: 'ds' }
  | { readonly kind: 'coda' }
  | { readonly kind: 'to-coda' }
  | { readonly kind: 'fine' }
  | { readonly kind: 'ending'; readonly number: number };

export type RepeatMarkerKind = RepeatMarker['kind'];

/** Decoded notation for one channel of one bar. */
export interface NotesChannel {
  readonly kind: 'notes';
  readonly source: string;
  readonly tokens: readonly NotationToken[];
  /** Exact beat sum of the tokens. */
  readonly duration: Fraction;
  readonly lyric?: string;
}

/**
 * Channel written as `%`: plays the previous bar's channel at the same index again.
 * Consumers resolve it explicitly through `resolveChannel`; content is never copied.
 */
export interface RepeatsPreviousChannel {
  readonly kind: 'repeats-previous';
  readonly source: string;
  readonly lyric?: string;
}

export type Channel = NotesChannel | RepeatsPreviousChannel;

/** Caller-supplied channel content. */
export interface ChannelInput {
  notes: string;
  lyric?: string;
}

/** One bar (measure) with its signature already resolved. */
export interface Bar {
  readonly index: number;
  /** Signature index written on this bar, when it changes the signature. */
  readonly signatureOverride?: number;
  /** Index of the signature in force for this bar. */
  readonly signatureIndex: number;
  readonly signature: Signature;
  readonly channels: readonly Channel[];
  readonly repeats: readonly RepeatMarker[];
}

/** Caller-supplied bar content. */
export interface BarInput {
  signature?: number;
  channels: ChannelInput[];
  repeats?: RepeatMarker[];
}

/** Assembled, validated score; treated as immutable by layout. */
export interface Score {
  readonly signatures: readonly Signature[];
  readonly bars: readonly Bar[];
}
