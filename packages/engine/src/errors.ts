/**
 * Error thrown when a hand skeleton cannot be measured.
 */
export class InvalidHandError extends Error {
  constructor(message: string) {
    super(`Invalid hand skeleton: ${message}`);
    this.name = 'InvalidHandError';
  }
}
