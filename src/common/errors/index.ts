export {
  LedgerNotInitializedError,
  LedgerUnavailableError,
  OperationTimeoutError,
  SentimentUnavailableError,
  TradeSubmissionError,
} from './domain.errors';
