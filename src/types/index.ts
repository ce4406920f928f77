export * from './config.js';
export * from './errors.js';
export * from './playlist.js';
export * from './song.js';
