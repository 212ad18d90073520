import type { SchemaObject } from '@nestjs/swagger/dist/interfaces/open-api-spec.interface';

const EXAMPLE_HOTKEY = '5FFApaS75bv5pJHfAp2FVLBj9ZaXuFDjEypsaBNc1wCfe52v';

// -- Auth --

export const ISSUE_TOKEN_BODY_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    apiToken: { type: 'string', description: 'Legacy shared API token' },
    scopes: {
      type: 'array',
      items: { type: 'string', enum: ['read', 'stake', 'admin'] },
      description: 'Subset of the legacy token scopes; all scopes when omitted',
    },
  },
  required: ['apiToken'],
};

export const ISSUED_TOKEN_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    accessToken: { type: 'string', example: 'eyJhbGciOiJIUzI1NiIs...' },
    tokenType: { type: 'string', enum: ['bearer'] },
    expiresIn: { type: 'integer', example: 2_592_000 },
  },
  required: ['accessToken', 'tokenType', 'expiresIn'],
};

// -- Dividends --

export const DIVIDEND_LOOKUP_RESPONSE_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    netuid: { type: 'integer', example: 18 },
    hotkey: { type: 'string', example: EXAMPLE_HOTKEY },
    dividendValue: { type: 'number', example: 1.5 },
    observedAt: { type: 'string', format: 'date-time' },
    source: { type: 'string', enum: ['live', 'fallback'] },
    servedFrom: { type: 'string', enum: ['cache', 'ledger'] },
    tradeTriggered: { type: 'boolean' },
    jobId: { type: 'string', format: 'uuid', nullable: true },
    status: { type: 'string', enum: ['success', 'partial_success'] },
    message: { type: 'string' },
  },
  required: [
    'netuid',
    'hotkey',
    'dividendValue',
    'observedAt',
    'source',
    'servedFrom',
    'tradeTriggered',
    'jobId',
    'status',
    'message',
  ],
};

const HISTORY_RECORD_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    id: { type: 'integer' },
    subnetId: { type: 'integer', example: 18 },
    accountKey: { type: 'string', example: EXAMPLE_HOTKEY },
    dividendValue: { type: 'number' },
    source: { type: 'string', enum: ['live', 'fallback'] },
    observedAt: { type: 'string', format: 'date-time' },
  },
};

export const DIVIDEND_HISTORY_PAGE_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    items: { type: 'array', items: HISTORY_RECORD_SCHEMA },
    limit: { type: 'integer', example: 100 },
  },
  required: ['items', 'limit'],
};

// -- Trade jobs --

export const TRADE_JOB_SCHEMA: SchemaObject = {
  type: 'object',
  properties: {
    jobId: { type: 'string', format: 'uuid' },
    subnetId: { type: 'integer' },
    accountKey: { type: 'string' },
    requestedAt: { type: 'string', format: 'date-time' },
    status: { type: 'string', enum: ['pending', 'running', 'succeeded', 'failed'] },
    result: {
      type: 'object',
      nullable: true,
      properties: {
        stakeDelta: { type: 'number', example: 0.05 },
        sentimentScore: { type: 'number', example: 5 },
        operation: { type: 'string', enum: ['stake', 'unstake', 'none'] },
        txRef: { type: 'string', nullable: true },
      },
    },
    error: { type: 'string', nullable: true },
    updatedAt: { type: 'string', format: 'date-time' },
  },
  required: ['jobId', 'subnetId', 'accountKey', 'requestedAt', 'status', 'result', 'error', 'updatedAt'],
};
