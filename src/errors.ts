/**
 * Raised when internal bookkeeping is asked to do something its current state
 * forbids, such as starting a timer that is already running. Never recovered
 * from: the scheduler treats it as fatal.
 */
export class ContractViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ContractViolationError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class PromptNotFoundError extends Error {
  constructor(readonly promptId: string) {
    super(`No break prompt with id ${promptId} is showing.`);
    this.name = "PromptNotFoundError";
  }
}

export type HandlerResult = { ok: true } | { ok: false; error: Error };

export const ok: HandlerResult = { ok: true };

export function fail(error: unknown): HandlerResult {
  return { ok: false, error: toError(error) };
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
