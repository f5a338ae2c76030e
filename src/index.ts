/**
 * index.ts
 *
 * Main entry point for the stellar-kyc-anchor package
 * Re-exports the SEP-12 service and the customer callback sender
 */

// SEP-12 request pipeline and service
export * from './sep12';

// Signed customer callbacks
export * from './callback';
