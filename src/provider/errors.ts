import type { ProviderFailureReason } from './types';

export class ProviderError extends Error {
  public readonly verb: string;
  public readonly reason: ProviderFailureReason;

  constructor(verb: string, reason: ProviderFailureReason, message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'ProviderError';
    this.verb = verb;
    this.reason = reason;
  }
}
