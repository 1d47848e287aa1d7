import { describe, it, expect } from 'vitest';
import {
  AppError,
  AuthenticationError,
  DataCloudError,
  JobTimeoutError,
  ValidationError,
  UpstreamError,
} from '../../src/shared/errors.js';

describe('Error classes', () => {
  it('AppError has statusCode and code', () => {
    const err = new AppError('test', 418, 'TEAPOT');
    expect(err.message).toBe('test');
    expect(err.statusCode).toBe(418);
    expect(err.code).toBe('TEAPOT');
    expect(err).toBeInstanceOf(Error);
  });

  it('AuthenticationError defaults to 401', () => {
    const err = new AuthenticationError();
    expect(err.statusCode).toBe(401);
    expect(err.code).toBe('AUTHENTICATION_ERROR');
  });

  it('ValidationError defaults to 400', () => {
    const err = new ValidationError('bad input');
    expect(err.statusCode).toBe(400);
    expect(err.message).toBe('bad input');
  });

  it('UpstreamError has upstream property', () => {
    const err = new UpstreamError('service down', 'datacloud');
    expect(err.statusCode).toBe(502);
    expect(err.upstream).toBe('datacloud');
  });

  it('DataCloudError keeps the vendor response', () => {
    const err = new DataCloudError('Job Info', 'https://t/api/v1/ingest/jobs/j1', 404, 'Not found');
    expect(err).toBeInstanceOf(AppError);
    expect(err.status).toBe(404);
    expect(err.statusCode).toBe(404);
    expect(err.code).toBe('DATACLOUD_ERROR');
    expect(err.message).toBe(
      "Salesforce Data Cloud error during 'Job Info' on https://t/api/v1/ingest/jobs/j1 (404): Not found",
    );
  });

  it('JobTimeoutError names the job and its last state', () => {
    const err = new JobTimeoutError('j1', 'InProgress');
    expect(err.statusCode).toBe(504);
    expect(err.message).toBe('Job j1 still InProgress when the wait timed out');
  });
});
