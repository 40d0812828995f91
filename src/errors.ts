import type { Capability, CapabilityFault } from './types.js';

/**
 * Base error class for media-sniff errors
 */
export class MediaSniffError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'MediaSniffError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const CAPABILITY_VERBS: Record<Capability, string> = {
  read: 'read from',
  seek: 'seek in',
  write: 'write to',
};

/**
 * Thrown when a stream handle lacks, or fails, an operation a decoder needs
 */
export class CapabilityError extends MediaSniffError {
  public readonly capability: Capability;
  public readonly fault: CapabilityFault;
  public readonly streamName: string;

  constructor(
    capability: Capability,
    fault: CapabilityFault,
    streamName: string,
    options?: ErrorOptions & { detail?: string }
  ) {
    const target = streamName || '<stream>';
    const message =
      fault === 'missing'
        ? `${target} is not a valid stream: no ${capability}() operation`
        : `cannot ${CAPABILITY_VERBS[capability]} stream ${target}` +
          (options?.detail ? `: ${options.detail}` : '');
    super(message, options);
    this.name = 'CapabilityError';
    this.capability = capability;
    this.fault = fault;
    this.streamName = streamName;
  }
}

/**
 * Thrown when XOR operands differ in length
 */
export class LengthMismatchError extends MediaSniffError {
  public readonly leftLength: number;
  public readonly rightLength: number;

  constructor(leftLength: number, rightLength: number) {
    super(`Only byte strings of equal length can be xored (got ${leftLength} and ${rightLength})`);
    this.name = 'LengthMismatchError';
    this.leftLength = leftLength;
    this.rightLength = rightLength;
  }
}

/**
 * Thrown when a header registry would map one header or one label twice
 */
export class RegistryConflictError extends MediaSniffError {
  public readonly key: string;

  constructor(kind: 'header' | 'label', key: string) {
    super(`Duplicate ${kind} in header registry: ${key}`);
    this.name = 'RegistryConflictError';
    this.key = key;
  }
}

/**
 * Thrown by the bundled stream handles when the open mode or state forbids an operation
 */
export class UnsupportedOperationError extends MediaSniffError {
  public readonly operation: string;

  constructor(operation: string, reason: string) {
    super(`${operation}: ${reason}`);
    this.name = 'UnsupportedOperationError';
    this.operation = operation;
  }
}
