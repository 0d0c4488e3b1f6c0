/**
 * Typed socket.io server and socket used by the dispatch endpoint.
 */

import { Server, Socket } from 'socket.io';
import { ResolvedIdentity } from '../auth/trust-gate';
import { OutboundMessage } from './dispatch.types';

export interface ServerToClientEvents {
  message: (message: OutboundMessage) => void;
}

export interface ClientToServerEvents {
  message: (message: unknown) => void;
}

export type InterServerEvents = Record<string, never>;

export interface SocketData {
  /** Set by the trust gate before admission runs */
  identity?: ResolvedIdentity;
}

export type DispatchServer = Server<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;

export type DispatchSocket = Socket<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>;
