export { SmartHomeFulfillment, SYNC_FAILURE_CODE, toCommandResult } from './fulfillment';
export type { SmartHomeFulfillmentOptions } from './fulfillment';
export { commandSchema } from './commands';
export type { CommandName, DeviceCommand } from './commands';
export { inputSchema, parseRequest, requestSchema } from './request';
export type { ExecuteGroup, FulfillmentInput, FulfillmentRequest } from './request';
