/**
 * Error types raised by the simulator core
 */

export class LinkNotFoundError extends Error {
  readonly name = 'LinkNotFoundError';

  constructor(
    readonly from: string,
    readonly to: string,
    detail: string
  ) {
    super(`Link ${from} <-> ${to} not found: ${detail}`);
  }
}

export class InvalidLinkCostError extends Error {
  readonly name = 'InvalidLinkCostError';

  constructor(readonly cost: number) {
    super(`Link cost must be a non-negative number, got ${cost}`);
  }
}

export class MalformedAdvertisementError extends Error {
  readonly name = 'MalformedAdvertisementError';
}

export class TransportError extends Error {
  readonly name = 'TransportError';

  constructor(
    message: string,
    readonly endpoint: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class SimulationStateError extends Error {
  readonly name = 'SimulationStateError';
}

export class TopologyParseError extends Error {
  readonly name = 'TopologyParseError';

  constructor(
    message: string,
    readonly line: number
  ) {
    super(`Line ${line}: ${message}`);
  }
}
