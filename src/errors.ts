/**
 * Error types raised by the relay. None of them is fatal to the process:
 * the poller and the listener catch, log and carry on.
 */

export class RelayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RelayError';
  }
}

/**
 * A DICOMweb or Orthanc REST call failed or answered with an unexpected status.
 */
export class DicomWebError extends RelayError {
  constructor(
    message: string,
    public readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'DicomWebError';
  }
}

/**
 * Association could not be established, was rejected or aborted, or a
 * DIMSE response did not arrive in time.
 */
export class AssociationError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AssociationError';
  }
}

/**
 * One or more objects of a study were not confirmed by the destination.
 */
export class DeliveryError extends RelayError {
  constructor(
    message: string,
    public readonly delivered: number,
    public readonly failed: number
  ) {
    super(message);
    this.name = 'DeliveryError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
