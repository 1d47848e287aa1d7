import { describe, it, expect } from 'vitest';
import { isSupportedEncoding, validateEnv } from '../../../src/config/env-validator.js';
import { ValidationError } from '../../../src/shared/errors.js';

const COMPLETE = {
  DATACLOUD_CLIENT_ID: 'cid',
  DATACLOUD_PRIVATE_KEY_FILE: 'server.key',
  DATACLOUD_USERNAME: 'a@b.com',
};

describe('validateEnv', () => {
  it('passes when every required variable is set', () => {
    expect(() => validateEnv(COMPLETE)).not.toThrow();
  });

  it('names every missing variable', () => {
    expect(() => validateEnv({ DATACLOUD_CLIENT_ID: 'cid' })).toThrow(
      'Missing required environment variables: DATACLOUD_PRIVATE_KEY_FILE, DATACLOUD_USERNAME',
    );
  });

  it('rejects an unknown input encoding', () => {
    expect(() =>
      validateEnv({ ...COMPLETE, DATACLOUD_INPUT_FILE_ENCODING: 'klingon-8' }),
    ).toThrow(ValidationError);
  });

  it('rejects a request timeout that is not a positive integer', () => {
    expect(() => validateEnv({ ...COMPLETE, DATACLOUD_REQUEST_TIMEOUT_MS: 'soon' })).toThrow(
      'DATACLOUD_REQUEST_TIMEOUT_MS must be a positive integer, got "soon"',
    );
    expect(() => validateEnv({ ...COMPLETE, DATACLOUD_REQUEST_TIMEOUT_MS: '0' })).toThrow(
      ValidationError,
    );
  });

  it('rejects a negative token lifetime', () => {
    expect(() => validateEnv({ ...COMPLETE, DATACLOUD_TOKEN_TTL_MINUTES: '-5' })).toThrow(
      'DATACLOUD_TOKEN_TTL_MINUTES must be a positive integer, got "-5"',
    );
  });

  it('accepts empty numeric variables, which fall back to defaults', () => {
    expect(() =>
      validateEnv({ ...COMPLETE, DATACLOUD_TOKEN_TTL_MINUTES: '', DATACLOUD_REQUEST_TIMEOUT_MS: '' }),
    ).not.toThrow();
  });
});

describe('isSupportedEncoding', () => {
  it('knows the WHATWG encodings', () => {
    expect(isSupportedEncoding('utf-8')).toBe(true);
    expect(isSupportedEncoding('latin1')).toBe(true);
    expect(isSupportedEncoding('utf-16le')).toBe(true);
    expect(isSupportedEncoding('klingon-8')).toBe(false);
  });
});
