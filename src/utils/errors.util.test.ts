import { describe, it, expect } from 'vitest';
import { ConversionError, ConversionErrorKind, isSystemError } from './errors.util';

function systemError(code: string, message: string): Error {
  return Object.assign(new Error(message), { code });
}

describe('ConversionError', () => {
  it('builds messages from the kind and detail', () => {
    const error = new ConversionError(ConversionErrorKind.ParseError, 'line 3: expected "=" after key');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ConversionError');
    expect(error.kind).toBe(ConversionErrorKind.ParseError);
    expect(error.message).toBe('Unable to parse profile: line 3: expected "=" after key');
    expect(new ConversionError(ConversionErrorKind.FileExists).message).toBe('File exists, refusing to overwrite');
  });

  describe('fromSystemError', () => {
    it('maps permission errors', () => {
      for (const code of ['EACCES', 'EPERM']) {
        const error = ConversionError.fromSystemError(systemError(code, `${code}: denied`));
        expect(error.kind).toBe(ConversionErrorKind.PermissionDenied);
        expect(error.message).toBe('Unable to open file');
      }
    });

    it('maps an existing destination', () => {
      expect(ConversionError.fromSystemError(systemError('EEXIST', 'EEXIST: file already exists')).kind)
        .toBe(ConversionErrorKind.FileExists);
    });

    it('keeps the system message for other errors', () => {
      const error = ConversionError.fromSystemError(systemError('ENOENT', 'ENOENT: no such file or directory'));

      expect(error.kind).toBe(ConversionErrorKind.OSError);
      expect(error.message).toBe('Unknown error: ENOENT: no such file or directory');
    });

    it('maps values that are not system errors to OSError', () => {
      expect(ConversionError.fromSystemError('boom').message).toBe('Unknown error: boom');
      expect(ConversionError.fromSystemError(new Error('plain')).kind).toBe(ConversionErrorKind.OSError);
    });

    it('passes conversion errors through', () => {
      const original = new ConversionError(ConversionErrorKind.MissingSSID);
      expect(ConversionError.fromSystemError(original)).toBe(original);
    });
  });

  it('maps any write failure to OSError', () => {
    const error = ConversionError.fromWriteError(systemError('EACCES', 'EACCES: denied'));
    expect(error.kind).toBe(ConversionErrorKind.OSError);
    expect(error.detail).toBe('EACCES: denied');
  });
});

describe('isSystemError', () => {
  it('requires an Error with a string code', () => {
    expect(isSystemError(systemError('ENOENT', 'missing'))).toBe(true);
    expect(isSystemError(new Error('plain'))).toBe(false);
    expect(isSystemError({ code: 'ENOENT' })).toBe(false);
  });
});
