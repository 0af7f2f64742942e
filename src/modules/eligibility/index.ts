/**
 * Credit Decision Engine - Eligibility Module
 */

export * from './types';
export * from './engine';
