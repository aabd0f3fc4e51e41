/**
 * Raised when a policy, signal vocabulary or run parameter is invalid.
 * Always thrown before the first event is processed.
 */
export class PolicyConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PolicyConfigError';
  }
}

export type EventDataErrorCode = 'malformed_price' | 'non_positive_price' | 'missing_column';

export type EventLocation = {
  index: number;
  timestamp?: string;
};

export function describeLocation(location: EventLocation): string {
  return location.timestamp
    ? `event #${location.index} (${location.timestamp})`
    : `event #${location.index}`;
}

/**
 * Error thrown for an input row the engine cannot process.
 */
export class EventDataError extends Error {
  readonly index: number | null;
  readonly timestamp: string | null;

  constructor(
    readonly code: EventDataErrorCode,
    message: string,
    location?: EventLocation
  ) {
    super(location ? `${describeLocation(location)}: ${message}` : message);
    this.name = 'EventDataError';
    this.index = location?.index ?? null;
    this.timestamp = location?.timestamp ?? null;
  }
}
