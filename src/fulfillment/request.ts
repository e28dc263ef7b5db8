/**
 * Fulfillment request schema and parser.
 */

import { z } from 'zod';
import { InvalidRequestError } from '../errors';
import { INTENTS } from '../types/fulfillment';
import { commandSchema } from './commands';

const deviceRef = z.object({
  id: z.string(),
  customData: z.record(z.unknown()).optional(),
});

const syncInput = z.object({ intent: z.literal(INTENTS.sync) });

const queryInput = z.object({
  intent: z.literal(INTENTS.query),
  payload: z.object({ devices: z.array(deviceRef) }),
});

const executeInput = z.object({
  intent: z.literal(INTENTS.execute),
  payload: z.object({
    commands: z.array(
      z.object({
        devices: z.array(deviceRef),
        execution: z.array(commandSchema),
      }),
    ),
  }),
});

const disconnectInput = z.object({ intent: z.literal(INTENTS.disconnect) });

export const inputSchema = z.discriminatedUnion('intent', [
  syncInput,
  queryInput,
  executeInput,
  disconnectInput,
]);

export const requestSchema = z.object({
  requestId: z.string(),
  inputs: z.array(inputSchema).min(1),
});

export type FulfillmentInput = z.infer<typeof inputSchema>;
export type FulfillmentRequest = z.infer<typeof requestSchema>;
export type ExecuteGroup = z.infer<typeof executeInput>['payload']['commands'][number];

/** Validate an untrusted request body. */
export function parseRequest(body: unknown): FulfillmentRequest {
  const parsed = requestSchema.safeParse(body);
  if (!parsed.success) {
    throw new InvalidRequestError(
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return parsed.data;
}
