/**
 * Smart-home fulfillment: the entry point for platform requests.
 *
 * Owns the device collection and turns each SYNC, QUERY, EXECUTE or
 * DISCONNECT request into its protocol response.  Requests are handled
 * one at a time, in arrival order; within a request, devices and
 * commands are processed in the order the request lists them.
 */

import type { Logger } from 'pino';
import { loadConfig } from '../config';
import type { FulfillmentConfig } from '../config';
import { collectQuery, collectSync, DeviceController, DeviceRegistry } from '../devices';
import type { Device, ExecuteOutcome, SmartHomeDevice } from '../devices';
import { DeviceError, errorMessage, UnsupportedCapabilityError } from '../errors';
import { createLogger } from '../logging';
import { INTENTS } from '../types/fulfillment';
import type {
  CommandResult,
  DisconnectPayload,
  ExecutePayload,
  FulfillmentResponse,
  QueryDeviceState,
  QueryPayload,
  ResponsePayload,
  SyncDevice,
  SyncPayload,
} from '../types/fulfillment';
import { parseRequest } from './request';
import type { ExecuteGroup, FulfillmentInput } from './request';

/** Top-level SYNC error code when a device fails with an infrastructure fault. */
export const SYNC_FAILURE_CODE = 'transientError';

export interface SmartHomeFulfillmentOptions {
  config?: Partial<FulfillmentConfig>;
  logger?: Logger;
}

export class SmartHomeFulfillment {
  readonly agentUserId: string;
  private config: FulfillmentConfig;
  private logger: Logger;
  private registry = new DeviceRegistry();
  private controller: DeviceController;
  private queue: Promise<void> = Promise.resolve();

  constructor(opts: SmartHomeFulfillmentOptions = {}) {
    this.config = loadConfig(opts.config);
    this.agentUserId = this.config.agentUserId;
    this.logger = opts.logger ?? createLogger(this.config);
    this.controller = new DeviceController(this.logger);
  }

  // -----------------------------------------------------------------------
  // Device collection
  // -----------------------------------------------------------------------

  /** Expose a device.  Its registered traits are fixed from here on. */
  addDevice<T extends SmartHomeDevice>(device: Device<T>): void {
    this.registry.add(device);
    this.logger.debug({ deviceId: device.id, traits: device.traits }, 'device added');
  }

  /** Stop exposing every device with the given id. */
  removeDevice(id: string): number {
    const removed = this.registry.remove(id);
    this.logger.debug({ deviceId: id, removed }, 'device removed');
    return removed;
  }

  getDeviceRegistry(): DeviceRegistry { return this.registry; }

  // -----------------------------------------------------------------------
  // Main dispatch
  // -----------------------------------------------------------------------

  /**
   * Handle one fulfillment request body.
   *
   * Rejects with `InvalidRequestError` when the body does not match the
   * wire schema, and with `UnsupportedCapabilityError` when a command
   * targets a trait its device never registered.
   */
  handleRequest(body: unknown): Promise<FulfillmentResponse> {
    const run = this.queue.then(() => this.process(body));
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async process(body: unknown): Promise<FulfillmentResponse> {
    const request = parseRequest(body);
    const { requestId } = request;
    const input = request.inputs[0];

    if (request.inputs.length > 1) {
      this.logger.warn({ requestId, inputs: request.inputs.length }, 'only the first input of a request is handled');
    }
    this.logger.info({ requestId, intent: input.intent }, 'handling request');

    let payload: ResponsePayload;
    try {
      payload = await this.dispatch(requestId, input);
    } catch (err) {
      if (err instanceof UnsupportedCapabilityError) {
        this.logger.error({ requestId, deviceId: err.deviceId, trait: err.trait }, err.message);
      }
      throw err;
    }

    this.logger.debug({ requestId, intent: input.intent }, 'request handled');
    return { requestId, payload };
  }

  private dispatch(requestId: string, input: FulfillmentInput): Promise<ResponsePayload> {
    switch (input.intent) {
      case INTENTS.sync:
        return this.sync();
      case INTENTS.query:
        return this.query(requestId, input.payload.devices);
      case INTENTS.execute:
        return this.execute(requestId, input.payload.commands);
      case INTENTS.disconnect:
        return this.disconnect();
      default: {
        const unknown: never = input;
        throw new Error(`Unsupported intent: ${JSON.stringify(unknown)}`);
      }
    }
  }

  // -----------------------------------------------------------------------
  // Intent handlers
  // -----------------------------------------------------------------------

  /** Describe every device.  Any device failure fails the whole payload. */
  private async sync(): Promise<SyncPayload> {
    try {
      const devices: SyncDevice[] = [];
      for (const device of this.registry.list()) {
        devices.push(await collectSync(device));
      }
      return { agentUserId: this.agentUserId, devices };
    } catch (err) {
      if (err instanceof UnsupportedCapabilityError) throw err;
      const debugString = errorMessage(err);
      this.logger.warn({ err }, 'SYNC failed');
      return {
        agentUserId: this.agentUserId,
        devices: [],
        errorCode: err instanceof DeviceError ? err.code : SYNC_FAILURE_CODE,
        debugString,
      };
    }
  }

  /** Answer for each requested id that resolves to a device. */
  private async query(requestId: string, refs: { id: string }[]): Promise<QueryPayload> {
    const devices: Record<string, QueryDeviceState> = {};
    for (const { id } of refs) {
      if (id in devices) continue;
      const device = this.registry.find(id);
      if (!device) {
        this.logger.debug({ requestId, deviceId: id }, 'QUERY for unknown device');
        continue;
      }
      const state = await collectQuery(device);
      devices[id] = state;
      this.logger.debug({ requestId, deviceId: id, status: state.status }, 'QUERY answered');
    }
    return { devices };
  }

  /**
   * Run every command of every group against every device it names, in
   * request order.  Unknown ids are skipped.  Each outcome becomes its own
   * single-id result.
   */
  private async execute(requestId: string, groups: ExecuteGroup[]): Promise<ExecutePayload> {
    const commands: CommandResult[] = [];
    for (const group of groups) {
      for (const { id } of group.devices) {
        const device = this.registry.find(id);
        if (!device) {
          this.logger.debug({ requestId, deviceId: id }, 'EXECUTE for unknown device');
          continue;
        }
        for (const command of group.execution) {
          const outcome = await this.controller.execute(device, command);
          commands.push(toCommandResult(id, outcome));
        }
      }
    }
    return { commands };
  }

  /** Tell every device the account was unlinked. */
  private async disconnect(): Promise<DisconnectPayload> {
    for (const device of this.registry.list()) {
      try {
        await device.disconnect();
      } catch (err) {
        this.logger.warn({ err, deviceId: device.id }, 'device failed to disconnect');
      }
    }
    return {};
  }
}

export function toCommandResult(id: string, outcome: ExecuteOutcome): CommandResult {
  if (outcome.ok) {
    return { ids: [id], status: 'SUCCESS', states: outcome.states };
  }
  const { error } = outcome;
  switch (error.kind) {
    case 'serializable':
      return { ids: [id], status: 'ERROR', errorCode: error.code };
    case 'server':
      return { ids: [id], status: 'OFFLINE', debugString: error.message };
  }
}
