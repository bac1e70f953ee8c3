import { describe, it, expect } from 'vitest';
import * as normalizer from './index';

/**
 * Test Suite: Library entry point
 *
 * Confirms the public surface is reachable from the package root.
 */
describe('Index', () => {
  it('should export the detection, transformation and output APIs', () => {
    expect(typeof normalizer.FormatRegistry).toBe('function');
    expect(typeof normalizer.ReportFormatDetector).toBe('function');
    expect(typeof normalizer.ReportTransformer).toBe('function');
    expect(typeof normalizer.CSVParser).toBe('function');
    expect(typeof normalizer.CSVGenerator).toBe('function');
    expect(typeof normalizer.BatchProcessor).toBe('function');
    expect(typeof normalizer.transformFile).toBe('function');
  });

  it('should export the canonical column list', () => {
    expect(normalizer.CANONICAL_COLUMNS).toHaveLength(16);
    expect(normalizer.CANONICAL_COLUMNS[0]).toBe('transaction_id');
    expect(normalizer.CANONICAL_COLUMNS[15]).toBe('notes');
  });

  it('should expose the active environment configuration', () => {
    expect(normalizer.environmentConfig.environment).toBe('test');
  });
});
