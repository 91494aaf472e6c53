export * from './types/index.js';
export * from './utils/Ledger.js';
export * from './utils/StateMap.js';
export * from './utils/MarketError.js';
export * from './utils/ProofVerifier.js';
export * from './utils/MockVerifier.js';
export * from './utils/ZkProgramVerifier.js';
export * from './utils/PriceFeed.js';
export * from './utils/MockPriceFeed.js';
export * from './utils/Commitments.js';
export * from './utils/SettlementMath.js';
export * from './utils/PoolMirror.js';
export * from './contracts/MerkleAccumulator.js';
export * from './contracts/NullifierRegistry.js';
export * from './contracts/FungibleToken.js';
export * from './contracts/AnonymityPool.js';
export * from './contracts/Market.js';
export * from './contracts/MarketRegistry.js';
export * from './deploy/deploy-local.js';
