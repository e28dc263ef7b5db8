/**
 * Smart-home fulfillment wire types.
 *
 * Request shapes are inferred from the schemas in `fulfillment/request`;
 * this module holds the response side.
 */

import type { StateFragment } from '../traits/common';

// ---------------------------------------------------------------------------
// Intents
// ---------------------------------------------------------------------------

export const INTENTS = {
  sync: 'action.devices.SYNC',
  query: 'action.devices.QUERY',
  execute: 'action.devices.EXECUTE',
  disconnect: 'action.devices.DISCONNECT',
} as const;

export type Intent = (typeof INTENTS)[keyof typeof INTENTS];

// ---------------------------------------------------------------------------
// SYNC
// ---------------------------------------------------------------------------

export interface SyncDevice {
  id: string;
  /** Namespaced device type, e.g. `action.devices.types.LIGHT`. */
  type: string;
  traits: string[];
  name: {
    name: string;
    defaultNames: string[];
    nicknames: string[];
  };
  willReportState: boolean;
  roomHint?: string;
  deviceInfo: {
    manufacturer: string;
    model: string;
    hwVersion: string;
    swVersion: string;
  };
  attributes: StateFragment;
}

export interface SyncPayload {
  agentUserId: string;
  devices: SyncDevice[];
  errorCode?: string;
  debugString?: string;
}

// ---------------------------------------------------------------------------
// QUERY
// ---------------------------------------------------------------------------

export type QueryStatus = 'SUCCESS' | 'OFFLINE' | 'ERROR' | 'EXCEPTIONS';

export interface QueryDeviceState {
  status: QueryStatus;
  online: boolean;
  /** Required by the protocol for every device, whatever its traits. */
  on: boolean;
  errorCode?: string;
  [state: string]: unknown;
}

export interface QueryPayload {
  devices: Record<string, QueryDeviceState>;
  errorCode?: string;
  debugString?: string;
}

// ---------------------------------------------------------------------------
// EXECUTE
// ---------------------------------------------------------------------------

export type CommandStatus = 'SUCCESS' | 'PENDING' | 'OFFLINE' | 'EXCEPTIONS' | 'ERROR';

/** Outcome of one command against one device. */
export interface CommandResult {
  ids: string[];
  status: CommandStatus;
  states?: StateFragment;
  errorCode?: string;
  debugString?: string;
}

export interface ExecutePayload {
  commands: CommandResult[];
  errorCode?: string;
  debugString?: string;
}

// ---------------------------------------------------------------------------
// DISCONNECT
// ---------------------------------------------------------------------------

export type DisconnectPayload = Record<string, never>;

// ---------------------------------------------------------------------------
// Envelope
// ---------------------------------------------------------------------------

export type ResponsePayload = SyncPayload | QueryPayload | ExecutePayload | DisconnectPayload;

export interface FulfillmentResponse<P extends ResponsePayload = ResponsePayload> {
  requestId: string;
  payload: P;
}
