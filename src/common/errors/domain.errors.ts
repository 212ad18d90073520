export class OperationTimeoutError extends Error {
  public constructor(
    public readonly operation: string,
    public readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${String(timeoutMs)}ms`);
    this.name = 'OperationTimeoutError';
  }
}

export class LedgerUnavailableError extends Error {
  public constructor(
    public readonly liveCause: string,
    public readonly fallbackCause: string,
  ) {
    super(`Ledger unavailable: live query failed (${liveCause}); fallback query failed (${fallbackCause})`);
    this.name = 'LedgerUnavailableError';
  }
}

export class LedgerNotInitializedError extends Error {
  public constructor(reason: string | null) {
    super(reason === null ? 'Ledger client is not initialized' : `Ledger client is not initialized: ${reason}`);
    this.name = 'LedgerNotInitializedError';
  }
}

export class SentimentUnavailableError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'SentimentUnavailableError';
  }
}

export class TradeSubmissionError extends Error {
  public constructor(message: string) {
    super(message);
    this.name = 'TradeSubmissionError';
  }
}
