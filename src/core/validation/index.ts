// src/core/validation/index.ts

export * from './labelValidator';
export * from './paramValidator';
