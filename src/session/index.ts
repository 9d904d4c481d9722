export * from './changelog.js';
export * from './dedupe-session.js';
