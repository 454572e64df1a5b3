/**
 * @fileoverview Collaborator exports
 */

export * from './base.js';
export * from './heuristic.js';
export * from './http.js';
export * from './openai.js';
