/**
 * Tagger abstraction: one implementation per ingestion input format.
 * A tagger serializes a synthetic event the way the target parser expects it
 * and embeds the tracking token where that parser's grammar still accepts it.
 */

import type { InputFormat, SyntheticEvent, TrackingToken } from '../core/types.js';

export interface TagContext {
  /** Field name the token is stored under. */
  trackingField: string;
  token: TrackingToken;
}

export interface ITagger {
  /** Unique identifier matching InputFormat */
  readonly format: InputFormat;

  /**
   * Serialize the event with the token injected.
   * @throws TaggingError when the event cannot be expressed in this format
   */
  tag(event: SyntheticEvent, ctx: TagContext): string;
}
