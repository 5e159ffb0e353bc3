import { validateEnvironment } from './env.validation';

describe('validateEnvironment', () => {
  it('converts numeric settings', () => {
    const env = validateEnvironment({ PORT: '4000', MAX_UPLOAD_BYTES: '2048', HF_TOKEN: '' });

    expect(env.PORT).toBe(4000);
    expect(env.MAX_UPLOAD_BYTES).toBe(2048);
    expect(env.HF_TOKEN).toBe('');
  });

  it('accepts an empty environment', () => {
    expect(() => validateEnvironment({})).not.toThrow();
  });

  it('rejects out-of-range values', () => {
    expect(() => validateEnvironment({ PORT: '70000' })).toThrow(
      'Invalid environment configuration:\n - PORT: PORT must not be greater than 65535',
    );
  });
});
