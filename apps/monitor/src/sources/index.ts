export * from './base.source';
export * from './alpha-vantage.source';
export * from './yahoo-finance.source';
