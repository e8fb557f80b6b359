// Central export for all type definitions

// Re-export configuration types
export * from '../config/types.js';

// Re-export token, session and storage types
export * from './token.js';
