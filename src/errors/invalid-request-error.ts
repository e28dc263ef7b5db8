/** A fulfillment request body that does not match the wire schema. */
export class InvalidRequestError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid fulfillment request: ${issues.join('; ')}`);
    this.name = 'InvalidRequestError';
    this.issues = issues;
  }
}
