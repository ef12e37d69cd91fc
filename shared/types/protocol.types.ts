import type { CrashEvent, RoadDelta, RoadSnapshot } from './simulation.types.ts';

export const PROTOCOL_VERSION = '1.0.0';

// ========== Server-to-Client Messages ==========

export interface HandshakePayload {
  protocolVersion: string;
  serverTime: number;
  numLanes: number;
  length: number;
}

export interface SnapshotMessage {
  type: 'snapshot';
  payload: RoadSnapshot;
}

export interface StateDeltaMessage {
  type: 'state-update';
  payload: RoadDelta;
}

export interface HeartbeatPayload {
  serverTime: number;
  tick: number;
}

export interface HeartbeatMessage {
  type: 'heartbeat';
  payload: HeartbeatPayload;
}

export interface CrashMessage {
  type: 'crash';
  payload: CrashEvent;
}

export type ServerMessage =
  | ({ type: 'handshake'; payload: HandshakePayload })
  | SnapshotMessage
  | StateDeltaMessage
  | HeartbeatMessage
  | CrashMessage;
