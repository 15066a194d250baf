export class AppError extends Error {
  constructor(
    message: string,
    public readonly status: number = 400,
    public readonly code: string = "BAD_REQUEST"
  ) {
    super(message);
  }
}

export function alreadyInitialized(): AppError {
  return new AppError("Auction is already initialized", 409, "ALREADY_INITIALIZED");
}

export function uninitialized(field: string): AppError {
  return new AppError(`Auction is not initialized: ${field} is missing`, 409, "UNINITIALIZED");
}

export function transferRejected(reason: string): AppError {
  return new AppError(`Transfer rejected: ${reason}`, 409, "TRANSFER_REJECTED");
}

export function contractFundsLocked(): AppError {
  return new AppError("Contract funds move only through settlement", 403, "CONTRACT_FUNDS_LOCKED");
}
