export * from './errors';
export * from './logger';
export * from './equality';
export * from './transform';

// Evented model
export * from './model/evented';
export * from './model/node';
export * from './model/scene';
export * from './model/camera';
export * from './model/image';
export * from './model/points';
export * from './model/factory';
export * from './model/layout';
export * from './model/view';
export * from './model/canvas';

// Backend contract + synchronization
export * from './adaptors/contracts';
export * from './adaptors/backend';
export * from './adaptors/setters';
export * from './adaptors/registry';

export * from './serialization';
export * from './util';
