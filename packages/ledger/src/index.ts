export * from './types/ledger-event.js';
export * from './types/account-snapshot.js';
export * from './errors/ledger-errors.js';
export * from './domain/transaction-record.js';
export * from './domain/client-account.js';
export * from './store/ledger-store.js';
export * from './store/in-memory-ledger-store.js';
export * from './store/serialized-ledger-store.js';
