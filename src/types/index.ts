/**
 * Central type definitions for the report normalizer
 *
 * This barrel file exports all types for convenient importing:
 * import { EnvironmentConfig, ReportFileError } from '../types';
 */

// Environment types
export * from "./environment";

// Error handling types
export * from "./errors";
