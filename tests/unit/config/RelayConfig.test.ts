import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as path from 'path';
import {
  getRelayConfig,
  loadRelayConfig,
  resetRelayConfig,
  validateRelayConfig,
  withOverrides,
} from '../../../src/config/RelayConfig.js';
import { RelayError } from '../../../src/errors.js';

describe('RelayConfig', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
    resetRelayConfig();
  });

  afterEach(() => {
    process.env = originalEnv;
    resetRelayConfig();
  });

  describe('loadRelayConfig', () => {
    it('should return defaults when no env vars set', () => {
      const config = loadRelayConfig({});

      expect(config.source).toEqual({
        kind: 'dicomweb',
        url: undefined,
        host: 'localhost',
        port: 4242,
        aeTitle: 'ORTHANC',
      });
      expect(config.retrieve).toBe('wado');
      expect(config.destination.kind).toBe('folder');
      expect(config.destination.port).toBe(104);
      expect(config.destination.aeTitle).toBe('STORESCP');
      expect(config.localAeTitle).toBe('DICOM_RELAY');
      expect(config.listenPort).toBe(11112);
      expect(config.outputDir).toBe('./received');
      expect(config.ledgerPath).toBe(path.join('./received', '.processed_studies.json'));
      expect(config.pollIntervalMs).toBe(5000);
      expect(config.retryBackoffMaxMs).toBe(0);
      expect(config.moveQuiescenceMs).toBe(5000);
      expect(config.moveTimeoutMs).toBe(300000);
      expect(config.httpTimeoutMs).toBe(60000);
    });

    it('should default to C-MOVE retrieval for Orthanc and DIMSE sources', () => {
      expect(loadRelayConfig({ RELAY_SOURCE_KIND: 'orthanc' }).retrieve).toBe('move');
      expect(loadRelayConfig({ RELAY_SOURCE_KIND: 'DIMSE' }).retrieve).toBe('move');
    });

    it('should parse every variable', () => {
      const config = loadRelayConfig({
        RELAY_SOURCE_KIND: 'orthanc',
        RELAY_SOURCE_URL: 'http://pacs:8042',
        RELAY_SOURCE_PORT: '4343',
        RELAY_DEST_KIND: 'dicomweb',
        RELAY_DEST_URL: 'http://archive/dicom-web',
        RELAY_LOCAL_AET: 'RELAY',
        RELAY_OUTPUT_DIR: '/data/in',
        RELAY_LEDGER_PATH: '/data/ledger.json',
        RELAY_POLL_INTERVAL_MS: '1000',
        RELAY_RETRY_BACKOFF_MAX_MS: '60000',
      });

      expect(config.source.url).toBe('http://pacs:8042');
      expect(config.source.port).toBe(4343);
      expect(config.destination).toMatchObject({ kind: 'dicomweb', url: 'http://archive/dicom-web' });
      expect(config.localAeTitle).toBe('RELAY');
      expect(config.outputDir).toBe('/data/in');
      expect(config.ledgerPath).toBe('/data/ledger.json');
      expect(config.pollIntervalMs).toBe(1000);
      expect(config.retryBackoffMaxMs).toBe(60000);
    });

    it('should fall back to the default for an unparseable number', () => {
      expect(loadRelayConfig({ RELAY_POLL_INTERVAL_MS: 'soon' }).pollIntervalMs).toBe(5000);
    });

    it('should reject an unknown kind', () => {
      expect(() => loadRelayConfig({ RELAY_DEST_KIND: 'ftp' })).toThrow(RelayError);
      expect(() => loadRelayConfig({ RELAY_RETRIEVE: 'get' })).toThrow(
        'RELAY_RETRIEVE must be one of wado, move (got "get")'
      );
    });
  });

  describe('getRelayConfig', () => {
    it('should cache until reset', () => {
      process.env['RELAY_LOCAL_AET'] = 'FIRST';
      const first = getRelayConfig();
      process.env['RELAY_LOCAL_AET'] = 'SECOND';
      expect(getRelayConfig()).toBe(first);

      resetRelayConfig();
      expect(getRelayConfig().localAeTitle).toBe('SECOND');
    });
  });

  describe('withOverrides', () => {
    it('should move the default ledger with the output directory', () => {
      const config = withOverrides(loadRelayConfig({}), { outputDir: '/tmp/out', pollIntervalMs: 50 });
      expect(config.outputDir).toBe('/tmp/out');
      expect(config.ledgerPath).toBe(path.join('/tmp/out', '.processed_studies.json'));
      expect(config.pollIntervalMs).toBe(50);
    });

    it('should keep an explicit ledger path', () => {
      const base = loadRelayConfig({ RELAY_LEDGER_PATH: '/var/lib/relay/ledger.json' });
      expect(withOverrides(base, { outputDir: '/tmp/out' }).ledgerPath).toBe('/var/lib/relay/ledger.json');
    });

    it('should ignore undefined overrides', () => {
      const base = loadRelayConfig({});
      expect(withOverrides(base, { outputDir: undefined, localAeTitle: undefined })).toEqual(base);
    });
  });

  describe('validateRelayConfig', () => {
    it('should require a source URL for DICOMweb', () => {
      expect(validateRelayConfig(loadRelayConfig({}))).toEqual([
        'RELAY_SOURCE_URL is required for a dicomweb source',
      ]);
    });

    it('should accept a complete DICOMweb to folder setup', () => {
      expect(validateRelayConfig(loadRelayConfig({ RELAY_SOURCE_URL: 'http://pacs/dicom-web' }))).toEqual([]);
    });

    it('should reject WADO retrieval from a non-DICOMweb source', () => {
      const problems = validateRelayConfig(
        loadRelayConfig({ RELAY_SOURCE_KIND: 'dimse', RELAY_RETRIEVE: 'wado' })
      );
      expect(problems).toEqual(['RELAY_RETRIEVE=wado needs a dicomweb source']);
    });

    it('should require a destination URL for STOW-RS', () => {
      const problems = validateRelayConfig(
        loadRelayConfig({ RELAY_SOURCE_KIND: 'dimse', RELAY_DEST_KIND: 'dicomweb' })
      );
      expect(problems).toEqual(['RELAY_DEST_URL is required for a dicomweb destination']);
    });

    it('should reject bad ports and AE titles', () => {
      const problems = validateRelayConfig(
        loadRelayConfig({
          RELAY_SOURCE_KIND: 'dimse',
          RELAY_SOURCE_PORT: '70000',
          RELAY_LOCAL_AET: 'AN_AE_TITLE_TOO_LONG',
        })
      );
      expect(problems).toEqual([
        'RELAY_SOURCE_PORT 70000 is not a valid port',
        'RELAY_LOCAL_AET must be 1 to 16 characters',
      ]);
    });
  });
});
