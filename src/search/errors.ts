export class StateChangedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StateChangedError";
  }
}

export class DeliveryTimeoutError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause?: unknown) {
    super(`No file was delivered after ${attempts} responses`, { cause });
    this.name = "DeliveryTimeoutError";
    this.attempts = attempts;
  }
}
