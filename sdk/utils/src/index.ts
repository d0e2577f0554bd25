export * from './encoding';
export * from './error';
export * from './errorchain';
export * from './format';
export * from './instrument';
export * from './is';
export * from './logger';
export * from './misc';
export * from './node-stack-trace';
export * from './object';
export * from './promisebuffer';
export * from './stacktrace';
export * from './string';
export * from './version';
export * from './worldwide';
