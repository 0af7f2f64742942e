/**
 * Credit Decision Engine - Loans Module
 *
 * Persisted customers and loans, their repositories and the origination service.
 */

export * from './loan-types';
export * from './loan.repository';
export * from './in-memory.repository';
export * from './origination.service';
export * from './seed';
