/**
 * Wire and connection types shared by the dispatch core.
 */

import { Principal } from '../user/principal';

/**
 * Envelope delivered to connections. `data` is type-specific.
 */
export interface OutboundMessage<T = unknown> {
  type: string;
  data: T;
}

export interface ErrorPayload {
  code: string;
  message: string;
  details?: Record<string, unknown>;
  retryable: boolean;
  requestType?: string;
}

/**
 * A live bidirectional channel as seen by the dispatch core.
 * `groups` is the membership set mutated by the owning session.
 */
export interface Connection {
  readonly id: string;
  /** null for an admitted anonymous viewer */
  readonly principal: Principal | null;
  readonly groups: Set<string>;
  deliver(message: OutboundMessage): void;
}
