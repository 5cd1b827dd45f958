/**
 * Error taxonomy shared by the services and the HTTP layer. Each class
 * carries the status a route answers with when the error reaches it.
 */
export abstract class AppError extends Error {
  abstract readonly status: number;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Bad or missing user input: no numbers, empty command, unreadable upload. */
export class InputError extends AppError {
  readonly status = 400;
}

/** A Twilio call placement or caller-ID lookup failed. */
export class ProviderError extends AppError {
  readonly status = 502;

  constructor(readonly code: string, message: string) {
    super(message);
  }
}

/** The AI text service could not be reached or replied with something unusable. */
export class AIServiceError extends AppError {
  readonly status = 502;
}

/** The call log could not be read or written. */
export class PersistenceError extends AppError {
  readonly status = 500;

  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}
