import { loadConfig } from '../config';
import { ValidationError } from '../utils/errors';

describe('loadConfig', () => {
  test('should fill every default from an empty environment', () => {
    const config = loadConfig({});

    expect(config.env).toBe('development');
    expect(config.server).toEqual({ host: '0.0.0.0', port: 8000, wsPort: 8001 });
    expect(config.capture).toMatchObject({ fps: 5, processEveryN: 3, dualRegion: true, scanningStatusEvery: 30 });
    expect(config.ocr.engines).toEqual(['tesseract', 'vision', 'placeholder']);
    expect(config.pricing).toMatchObject({ cacheTtlHours: 24, fuzzyThreshold: 60, minimumComparables: 3, cachePath: '' });
    expect(config.continuity.ttlMs).toBe(30000);
    expect(config.history.cap).toBe(50);
    expect(config.soldListings.appId).toBeUndefined();
    expect(config.llm.baseUrl).toBeUndefined();
  });

  test('should read overrides from the environment', () => {
    const config = loadConfig({
      NODE_ENV: 'test',
      API_PORT: '9000',
      OCR_ENGINES: 'placeholder, tesseract',
      AUDIO_ENABLED: 'false',
      OCR_DUAL_REGION: 'yes',
      EBAY_APP_ID: 'test-app-id',
      LLM_BASE_URL: 'http://localhost:1234',
      HISTORY_DB_PATH: './data/history.db',
    });

    expect(config.env).toBe('test');
    expect(config.server.port).toBe(9000);
    expect(config.ocr.engines).toEqual(['placeholder', 'tesseract']);
    expect(config.audio.enabled).toBe(false);
    expect(config.capture.dualRegion).toBe(true);
    expect(config.soldListings.appId).toBe('test-app-id');
    expect(config.llm.baseUrl).toBe('http://localhost:1234');
    expect(config.history.dbPath).toBe('./data/history.db');
  });

  test('should treat blank values as unset', () => {
    expect(loadConfig({ API_PORT: '  ', EBAY_APP_ID: '' }).server.port).toBe(8000);
  });

  test('should reject invalid values with the offending path', () => {
    expect(() => loadConfig({ API_PORT: 'abc' })).toThrow(ValidationError);
    expect(() => loadConfig({ API_PORT: 'abc' })).toThrow(/^Invalid configuration: server\.port: /);
    expect(() => loadConfig({ OCR_ENGINES: 'bogus' })).toThrow(/ocr\.engines\.0/);
    expect(() => loadConfig({ PROCESS_EVERY_N_FRAMES: '0' })).toThrow(/capture\.processEveryN/);
  });
});
