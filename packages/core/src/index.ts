export * from './compatibility.js';
export * from './deprecation.js';
export * from './discovery.js';
export * from './engine.js';
export * from './errors.js';
export * from './request-view.js';
export * from './resolver.js';
export * from './route-table.js';
export * from './strategies/index.js';
export * from './version.js';
