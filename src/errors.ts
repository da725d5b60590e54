/**
 * Raised before any job is dispatched: invalid worker count, empty job set,
 * malformed identity pool, bad durations, selectors or patterns.
 */
export class ConfigurationError extends Error {
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    this.name = 'ConfigurationError';
    this.field = field;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// Sending to or sealing an already sealed channel
export class ChannelClosedError extends Error {
  constructor(message = 'channel is already closed') {
    super(message);
    this.name = 'ChannelClosedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
