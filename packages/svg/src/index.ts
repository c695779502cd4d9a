export * from './format';
export * from './element';
export * from './colormaps';
export * from './markers';
export * from './adaptors/options';
export * from './adaptors/node';
export * from './adaptors/camera';
export * from './adaptors/image';
export * from './adaptors/points';
export * from './adaptors/view';
export * from './adaptors/canvas';
export * from './backend';
