import { loadConfig } from '../src/config';
import { ConfigurationError } from '../src/domain/errors';
import { LogLevel } from '../src/logger';

const REQUIRED = { GOOGLE_API_KEY: 'test-secret', SERPER_API_KEY: 'test-secret' };

function configError(env: NodeJS.ProcessEnv): ConfigurationError {
  try {
    loadConfig(env);
  } catch (err) {
    if (err instanceof ConfigurationError) return err;
    throw err;
  }
  throw new Error('Expected loadConfig to fail');
}

describe('loadConfig', () => {
  test('applies defaults', () => {
    expect(loadConfig({ ...REQUIRED })).toEqual({
      generation: { apiKey: 'test-secret', model: 'gemini-flash-latest', maxAttempts: 1 },
      search: { apiKey: 'test-secret' },
      loops: { analysisMaxSteps: 5, searchMaxIterations: 3, chartMaxIterations: 3 },
      auditLogPath: undefined,
      logLevel: LogLevel.Info,
      inspectionPort: 5000,
    });
  });

  test('reads overrides from strings', () => {
    const config = loadConfig({
      ...REQUIRED,
      GENERATION_MODEL: 'gemini-pro-latest',
      GENERATION_MAX_ATTEMPTS: '3',
      ANALYSIS_MAX_STEPS: '8',
      CHART_MAX_ITERATIONS: '1',
      AUDIT_LOG_PATH: '/tmp/audit.jsonl',
      LOG_LEVEL: 'debug',
      INSPECTION_PORT: '0',
    });

    expect(config.generation).toEqual({ apiKey: 'test-secret', model: 'gemini-pro-latest', maxAttempts: 3 });
    expect(config.loops).toEqual({ analysisMaxSteps: 8, searchMaxIterations: 3, chartMaxIterations: 1 });
    expect(config.auditLogPath).toBe('/tmp/audit.jsonl');
    expect(config.logLevel).toBe(LogLevel.Debug);
    expect(config.inspectionPort).toBe(0);
  });

  test('empty strings count as unset', () => {
    const config = loadConfig({ ...REQUIRED, GENERATION_MODEL: '', AUDIT_LOG_PATH: '' });
    expect(config.generation.model).toBe('gemini-flash-latest');
    expect(config.auditLogPath).toBeUndefined();
  });

  test('missing credentials are fatal', () => {
    const err = configError({ SERPER_API_KEY: 'test-secret', GOOGLE_API_KEY: '' });
    expect(err.keys).toEqual(['GOOGLE_API_KEY']);
    expect(err.message).toBe('Configuration validation failed:\n  - GOOGLE_API_KEY: Required');
    expect(err.typedError.code).toBe('CONFIG.INVALID');
  });

  test('every invalid key is reported', () => {
    const err = configError({ ...REQUIRED, ANALYSIS_MAX_STEPS: '0', LOG_LEVEL: 'verbose', INSPECTION_PORT: 'http' });
    expect(err.keys).toEqual(['ANALYSIS_MAX_STEPS', 'LOG_LEVEL', 'INSPECTION_PORT']);
  });
});
