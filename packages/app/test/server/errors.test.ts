import {
  ConfigError,
  ReplyTooLargeError,
  SessionNotFoundError,
  ShuttingDownError,
  StoreUnavailableError,
  UpstreamError,
  ValidationError
} from '@mcp-relay/core';
import { describe, expect, test } from 'vitest';
import { getStatusForError } from '../../src/server/errors';

describe('getStatusForError', () => {
  test.each([
    [new SessionNotFoundError('abc'), 404],
    [new ValidationError('bad'), 400],
    [new ReplyTooLargeError(10), 413],
    [new UpstreamError('down', 500), 502],
    [new StoreUnavailableError('getSession'), 503],
    [new ShuttingDownError(), 503],
    [new ConfigError('bad config'), 500],
    [new Error('plain'), 500]
  ])('%s maps to %i', (error, status) => {
    expect(getStatusForError(error)).toBe(status);
  });

  test('relay errors serialize with their code', () => {
    expect(new SessionNotFoundError('abc').toObject()).toEqual({
      error: { code: 'SESSION_NOT_FOUND', message: "Session 'abc' not found" }
    });
  });
});
