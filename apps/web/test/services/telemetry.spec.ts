import { beforeEach, describe, expect, it, vi } from 'vitest';
import * as Sentry from '@sentry/react';
import { ApiError } from '../../src/services/api.js';
import { describeError, reportError } from '../../src/services/telemetry.js';

vi.mock('@sentry/react', () => ({ captureException: vi.fn() }));

describe('reportError', () => {
  beforeEach(() => {
    vi.mocked(Sentry.captureException).mockClear();
  });

  it('should log and forward the status of an ApiError', () => {
    const log = vi.spyOn(console, 'error').mockImplementation(() => {});
    const error = new ApiError('Server unavailable', 503, { error: 'Server unavailable' });

    reportError(error, 'mood.save');

    expect(log).toHaveBeenCalledWith('[lumen] mood.save', error);
    expect(Sentry.captureException).toHaveBeenCalledWith(error, {
      tags: { context: 'mood.save' },
      extra: { status: 503 },
    });
  });

  it('should forward other errors without extras', () => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    const error = new TypeError('Failed to fetch');

    reportError(error, 'talk.send');

    expect(Sentry.captureException).toHaveBeenCalledWith(error, {
      tags: { context: 'talk.send' },
      extra: undefined,
    });
  });
});

describe('describeError', () => {
  it('should prefer the error message', () => {
    expect(describeError(new ApiError('Server unavailable', 500, null), 'Failed')).toBe('Server unavailable');
  });

  it('should fall back for non-errors and empty messages', () => {
    expect(describeError('boom', 'Failed')).toBe('Failed');
    expect(describeError(new Error(''), 'Failed')).toBe('Failed');
  });
});
