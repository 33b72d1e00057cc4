// Common types used across the domain

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

/**
 * Stock-keeping unit identifier, e.g. "RED-CHAIR"
 */
export type Sku = string;

/**
 * Batch reference, unique per batch
 */
export type BatchReference = string;
