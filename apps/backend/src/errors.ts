export type ServiceName = 'google-books' | 'cohere';

export type AssistantErrorKind = 'transport' | 'generation';

/**
 * Base class for failures of a public assistant operation.
 */
export abstract class AssistantError extends Error {
  abstract readonly kind: AssistantErrorKind;
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Network, timeout or non-2xx failure while talking to an external service.
 */
export class TransportError extends AssistantError {
  readonly kind = 'transport';
  readonly code = 'TRANSPORT_ERROR';
  service: ServiceName;
  status?: number;

  constructor(
    message: string,
    options: { service: ServiceName; status?: number; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.service = options.service;
    this.status = options.status;
  }
}

/**
 * The generation service answered but gave nothing usable, or failed for a non-transport reason.
 */
export class GenerationError extends AssistantError {
  readonly kind = 'generation';
  readonly code = 'GENERATION_ERROR';
}

export class ConfigError extends Error {
  issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
