export * from './outstanding-transaction';
export * from './reply';
export * from './transaction-ledger';
