import { describe, expect, it } from 'vitest';

import { AbsentValueError, isAbsentValueError } from './errors.mjs';
import { none, unwrap } from './option.mjs';

describe('AbsentValueError', () => {
  it('should carry a name, code and default message', () => {
    const error = new AbsentValueError();

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('AbsentValueError');
    expect(error.code).toBe('ABSENT_VALUE');
    expect(error.message).toBe('tried to unwrap an absent value');
    expect(error.context).toBeUndefined();
  });

  it('should keep a custom message and context', () => {
    const error = new AbsentValueError('no config', { key: 'port' });

    expect(error.message).toBe('no config');
    expect(error.context).toEqual({ key: 'port' });
  });

  it('should be recognised by isAbsentValueError', () => {
    let caught: unknown;
    try {
      unwrap(none());
    } catch (error) {
      caught = error;
    }

    expect(isAbsentValueError(caught)).toBe(true);
    expect(isAbsentValueError(new Error('other'))).toBe(false);
    expect(isAbsentValueError('ABSENT_VALUE')).toBe(false);
  });

  it('should capture a stack trace', () => {
    const error = new AbsentValueError();
    expect(error.stack).toContain('AbsentValueError');
  });
});
