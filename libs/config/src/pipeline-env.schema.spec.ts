import { ConfigValidationError } from '@app/shared-types';
import { PIPELINE_ENV_KEYS, validatePipelineEnv } from './pipeline-env.schema';

describe('validatePipelineEnv', () => {
  it('should keep unrelated variables', () => {
    expect(validatePipelineEnv({ HOME: '/home/test' })).toMatchObject({
      HOME: '/home/test',
      MIN_LENGTH: 20,
    });
  });

  it('should list every failing variable', () => {
    let caught: unknown;
    try {
      validatePipelineEnv({ TOP_K: '0', LOG_LEVEL: 'loud' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    expect(caught).toMatchObject({
      issues: [
        expect.stringMatching(/^LOG_LEVEL: /),
        expect.stringMatching(/^TOP_K: /),
      ],
    });
  });

  it('should default the extra stopword file to the bundled list', () => {
    expect(validatePipelineEnv({}).EXTRA_STOPWORDS_FILE).toBe(
      'config/extra-stopwords.json',
    );
    expect(
      validatePipelineEnv({ EXTRA_STOPWORDS_FILE: '' }).EXTRA_STOPWORDS_FILE,
    ).toBe('');
  });

  it('should parse boolean flags', () => {
    expect(validatePipelineEnv({ EXCLUDE_ALL_BRANDS: 'on' }).EXCLUDE_ALL_BRANDS).toBe(true);
    expect(validatePipelineEnv({ EXCLUDE_ALL_BRANDS: 'no' }).EXCLUDE_ALL_BRANDS).toBe(false);
  });

  it('should expose the known keys', () => {
    expect(PIPELINE_ENV_KEYS).toEqual(
      expect.arrayContaining(['INPUT_DIR', 'MIN_DF', 'EXTRA_STOPWORDS_FILE']),
    );
  });
});
