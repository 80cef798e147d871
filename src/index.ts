// Public API
export * from './kernel-core/Errors.js';
export * from './kernel-core/L0/Logger.js';
export * from './kernel-core/L0/Semaphore.js';
export * from './kernel-core/L0/Deferred.js';
export * from './kernel-core/L0/EditDistance.js';
export * from './kernel-core/L0/ActionTree.js';
export * from './kernel-core/L0/ContractRegistry.js';
export * from './kernel-core/L1/Identity.js';
export * from './kernel-core/L1/UnitRegistry.js';
export * from './kernel-core/L2/Policy.js';
export * from './kernel-core/L3/Events.js';
export * from './kernel-core/L4/Navigation.js';
export * from './kernel-core/L5/Imc.js';
export * from './Platform/Config.js';
export * from './Platform/ModularPlatform.js';
