export * from './Constants.js';
export * from './Bet.js';
export * from './MarketConfig.js';
export * from './MarketInfo.js';
export * from './Events.js';
