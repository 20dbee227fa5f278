import * as path from 'path';
import { defaultExportPath, loadEnrichmentConfig } from '../../../config/enrichmentConfig';
import { FatalConfigurationError } from '../../../types/EnrichmentErrors';

describe('enrichmentConfig', () => {
  describe('loadEnrichmentConfig', () => {
    it('applies defaults when only the work set is given', () => {
      const config = loadEnrichmentConfig({ WORKSET_PATH: 'data/compounds.csv' });

      expect(config).toEqual({
        worksetPath: 'data/compounds.csv',
        outputPath: 'structure_enrichment_output.txt',
        exportPath: 'structure_enrichment_output.csv',
        exportIdentifierColumn: 'smiles',
        columns: {
          hasHeader: false,
          keyColumn: '0',
          labelColumn: '1',
          secondaryKeyColumn: undefined,
          synonymSeparator: ' or ',
        },
        collectProvenance: true,
        httpTimeoutMs: 10000,
        httpUserAgent: 'phytochem-enrich/0.1 (batch structure enrichment)',
        sourceChainPath: undefined,
      });
    });

    it('reads explicit values and treats empty strings as unset', () => {
      const config = loadEnrichmentConfig({
        WORKSET_PATH: 'in.csv',
        OUTPUT_PATH: 'out/run.txt',
        EXPORT_PATH: '',
        WORKSET_HAS_HEADER: 'true',
        WORKSET_KEY_COLUMN: 'id',
        WORKSET_LABEL_COLUMN: 'name',
        WORKSET_SECONDARY_KEY_COLUMN: 'inchikey',
        COLLECT_PROVENANCE: '0',
        HTTP_TIMEOUT_MS: '2500',
      });

      expect(config.outputPath).toBe('out/run.txt');
      expect(config.exportPath).toBe(path.join('out', 'run.csv'));
      expect(config.columns).toEqual({
        hasHeader: true,
        keyColumn: 'id',
        labelColumn: 'name',
        secondaryKeyColumn: 'inchikey',
        synonymSeparator: ' or ',
      });
      expect(config.collectProvenance).toBe(false);
      expect(config.httpTimeoutMs).toBe(2500);
    });

    it('rejects a missing work set path', () => {
      expect(() => loadEnrichmentConfig({})).toThrow(FatalConfigurationError);
    });

    it('rejects named columns without a header row', () => {
      expect(() => loadEnrichmentConfig({ WORKSET_PATH: 'in.csv', WORKSET_KEY_COLUMN: 'id' })).toThrow(
        /WORKSET_KEY_COLUMN: WORKSET_KEY_COLUMN must be a zero-based column index/
      );
    });

    it('rejects a non-numeric timeout', () => {
      let caught: unknown;
      try {
        loadEnrichmentConfig({ WORKSET_PATH: 'in.csv', HTTP_TIMEOUT_MS: 'soon' });
      } catch (error) {
        caught = error;
      }
      expect(caught).toBeInstanceOf(FatalConfigurationError);
      expect(caught).toMatchObject({ error_code: 'INVALID_CONFIG' });
      expect(String(caught)).toContain('HTTP_TIMEOUT_MS');
    });

    it('rejects an unrecognised boolean flag', () => {
      expect(() => loadEnrichmentConfig({ WORKSET_PATH: 'in.csv', COLLECT_PROVENANCE: 'maybe' })).toThrow(
        /COLLECT_PROVENANCE/
      );
    });
  });

  describe('defaultExportPath', () => {
    it('swaps the extension for .csv in the same directory', () => {
      expect(defaultExportPath(path.join('runs', 'lotus_output.txt'))).toBe(path.join('runs', 'lotus_output.csv'));
    });
  });
});
