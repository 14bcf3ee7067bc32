import { describe, it, expect } from 'vitest';
import { attemptStep, OrganizerError, recoverStep, stepFailed, stepSucceeded, toError } from './errors';
import { Logger } from './logger';

describe('attemptStep', () => {
  it('wraps the resolved value', async () => {
    const result = await attemptStep('moveFile', async () => '/dest/song.mp3');
    expect(result).toEqual({ ok: true, value: '/dest/song.mp3' });
  });

  it('tags a thrown error with the stage', async () => {
    const result = await attemptStep('moveFile', async () => {
      throw new Error('EACCES');
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.stage).toBe('moveFile');
      expect(result.error.message).toBe('EACCES');
    }
  });

  it('converts non-Error throwables', async () => {
    const result = await attemptStep('extractMetadata', async () => {
      throw 'corrupt header';
    });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(Error);
      expect(result.error.message).toBe('corrupt header');
    }
  });
});

describe('recoverStep', () => {
  it('passes successful values through without logging', () => {
    const logger = new Logger({ console: false });
    expect(recoverStep(stepSucceeded(42), logger)).toBe(42);
    expect(logger.getLogs()).toHaveLength(0);
  });

  it('logs one ERROR entry naming the stage and returns null', () => {
    const logger = new Logger({ console: false });
    const value = recoverStep(stepFailed('resolveDestination', new Error('disk full')), logger, '/music/a.mp3');

    expect(value).toBeNull();
    const errors = logger.getLogs('error');
    expect(errors).toHaveLength(1);
    expect(errors[0].message).toBe('Error in resolveDestination (/music/a.mp3): disk full');
    expect(errors[0].context).toBe('resolveDestination');
  });
});

describe('OrganizerError', () => {
  it('keeps the stage and cause', () => {
    const cause = new Error('EISDIR');
    const error = new OrganizerError('Cannot open manifest', 'openManifest', { cause });
    expect(error.name).toBe('OrganizerError');
    expect(error.stage).toBe('openManifest');
    expect(error.cause).toBe(cause);
  });
});

describe('toError', () => {
  it('returns Error instances unchanged', () => {
    const error = new Error('x');
    expect(toError(error)).toBe(error);
  });
});
