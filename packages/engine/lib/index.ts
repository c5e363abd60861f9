export * from './constants';
export * from './clock';
export * from './geo-engine';
export * from './polygon-engine';
export * from './cut-engine';
export * from './split-engine';
export * from './front-engine';
export * from './wave-engine';
export * from './viewport-engine';
export * from './schedule-engine';
export * from './schemas';
