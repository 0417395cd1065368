import type { ApiStatus } from './resource-types.ts';

/**
 * Base class for the errors this client raises on purpose.
 * Anything else escaping a call came from the transport or the runtime.
 */
export class KubernetesClientError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'KubernetesClientError';
  }
}

/**
 * The API answered with a non-success HTTP status.
 * `status` holds the Status payload when the body could be read as one.
 */
export class ClientError extends KubernetesClientError {
  constructor(
    message: string,
    public readonly httpCode: number,
    public readonly status: ApiStatus | null,
    /** Which resource type the request was about, for log readers */
    public readonly resourceType: string,
  ) {
    super(message);
    this.name = 'ClientError';
  }

  /** Machine-readable reason from the Status payload, e.g. "Conflict" */
  get reason(): string | null {
    return this.status?.reason ?? null;
  }
}

/** A successful response carried something we could not understand. */
export class ProtocolError extends KubernetesClientError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ProtocolError';
  }
}

/** Fatal to one streaming subscription: bad Content-Type, bad line, bad event. */
export class StreamProtocolError extends ProtocolError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'StreamProtocolError';
  }
}

/** A kubeconfig couldn't be read, or asks for something this client doesn't do. */
export class KubeConfigError extends KubernetesClientError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'KubeConfigError';
  }
}

export function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === 'AbortError';
}
