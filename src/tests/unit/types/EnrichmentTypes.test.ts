import { capTier, compareTiers, emptyRunStatistics } from '../../../types/EnrichmentTypes';
import {
  CheckpointParseAnomaly,
  EnrichmentError,
  FatalConfigurationError,
  ItemProcessingFault,
  SourceUnavailableError,
} from '../../../types/EnrichmentErrors';

describe('EnrichmentTypes', () => {
  describe('compareTiers', () => {
    it('orders FULL > DEGRADED > UNRESOLVED', () => {
      expect(compareTiers('FULL', 'DEGRADED')).toBeGreaterThan(0);
      expect(compareTiers('DEGRADED', 'UNRESOLVED')).toBeGreaterThan(0);
      expect(compareTiers('UNRESOLVED', 'FULL')).toBeLessThan(0);
      expect(compareTiers('DEGRADED', 'DEGRADED')).toBe(0);
    });
  });

  describe('capTier', () => {
    it('clamps to the source maximum', () => {
      expect(capTier('FULL', 'DEGRADED')).toBe('DEGRADED');
      expect(capTier('DEGRADED', 'FULL')).toBe('DEGRADED');
      expect(capTier('UNRESOLVED', 'DEGRADED')).toBe('UNRESOLVED');
    });
  });

  it('emptyRunStatistics starts every counter at zero', () => {
    expect(emptyRunStatistics()).toEqual({
      total: 0,
      full: 0,
      degraded: 0,
      unresolved: 0,
      failed: 0,
      skipped: 0,
    });
  });
});

describe('EnrichmentErrors', () => {
  it('SourceUnavailableError is retryable and prefixes the source', () => {
    const error = new SourceUnavailableError('pubchem', 'HTTP 503', 'HTTP_503');
    expect(error).toBeInstanceOf(EnrichmentError);
    expect(error.message).toBe('pubchem: HTTP 503');
    expect(error.error_class).toBe('SOURCE');
    expect(error.error_code).toBe('HTTP_503');
    expect(error.retryable).toBe(true);
    expect(error.name).toBe('SourceUnavailableError');
  });

  it('ItemProcessingFault keeps the item key and cause', () => {
    const cause = new Error('bad row');
    const fault = new ItemProcessingFault('C9', 'Malformed work item', cause);
    expect(fault.itemKey).toBe('C9');
    expect(fault.error_class).toBe('ITEM');
    expect(fault.cause).toBe(cause);
    expect(fault.retryable).toBe(false);
  });

  it('CheckpointParseAnomaly describes the section', () => {
    const anomaly = new CheckpointParseAnomaly('C2', 'TRUNCATED', 14);
    expect(anomaly.message).toBe('Section for item C2 at line 14 is incomplete (TRUNCATED)');
    expect(anomaly.error_code).toBe('TRUNCATED');
  });

  it('FatalConfigurationError defaults its code', () => {
    expect(new FatalConfigurationError('no work set').error_code).toBe('FATAL_CONFIGURATION');
    expect(new FatalConfigurationError('no work set', 'WORKSET_UNREADABLE').error_code).toBe(
      'WORKSET_UNREADABLE'
    );
  });
});
