export * from './types.js';
export * from './value.js';
export * from './frontmatter.js';
export * from './note.js';
export * from './query.js';
export * from './diagnostics.js';
export * from './scanner.js';
export * from './output.js';
export { loadConfig, defaultConfig, type AppConfig } from './config.js';
export { createApp, startServer, type ServerConfig } from './server.js';
