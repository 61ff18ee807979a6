export { applyFold } from './fold.js';
export { applySalt } from './salt.js';
