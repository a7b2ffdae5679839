export * from './Queryable';
export * from './TradeHistoryRepository';
