export * from './logger.js';
export * from './utils.js';
export * from './message/frames.js';
export * from './message/beacon.js';
export * from './registry/peer.js';
export * from './registry/peer-table.js';
export * from './gossip/dedup-cache.js';
export * from './gossip/router.js';
export * from './discovery/beacon.js';
export * from './peer/link.js';
export * from './peer/server.js';
export * from './peer/client.js';
export * from './peer/manager.js';
export * from './node.js';
export * from './config.js';
