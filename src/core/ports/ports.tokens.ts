export const LEDGER_CLIENT: unique symbol = Symbol('LEDGER_CLIENT');
export const SENTIMENT_SOURCE: unique symbol = Symbol('SENTIMENT_SOURCE');
