export * from './common.js';
export * from './project.js';
export * from './tag.js';
export * from './user.js';
export * from './version.js';
