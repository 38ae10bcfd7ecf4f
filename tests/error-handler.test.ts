import { ErrorCode } from '../src/types';
import { CheckerError, ErrorHandler } from '../src/utils/error-handler';

describe('ErrorHandler', () => {
  test('should create checker errors with a code', () => {
    const error = ErrorHandler.createError(ErrorCode.FileNotFound, 'File not found: a.nc', { path: 'a.nc' });

    expect(error).toBeInstanceOf(CheckerError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe(ErrorCode.FileNotFound);
    expect(error.details).toEqual({ path: 'a.nc' });
  });

  test('should classify fatal input and settings errors', () => {
    const missing = ErrorHandler.createError(ErrorCode.FileNotFound, 'missing');
    const unreadable = ErrorHandler.createError(ErrorCode.FileUnreadable, 'unreadable');
    const settings = ErrorHandler.createError(ErrorCode.InvalidSettings, 'bad settings');

    expect(ErrorHandler.isFatalInputError(missing)).toBe(true);
    expect(ErrorHandler.isFatalInputError(unreadable)).toBe(true);
    expect(ErrorHandler.isFatalInputError(settings)).toBe(false);
    expect(ErrorHandler.isFatalInputError(new Error('plain'))).toBe(false);
    expect(ErrorHandler.isSettingsError(settings)).toBe(true);
  });

  test('should format errors', () => {
    expect(ErrorHandler.formatError(ErrorHandler.createError(ErrorCode.FileUnreadable, 'EACCES'))).toBe(
      '[FILE_UNREADABLE] EACCES'
    );
    expect(ErrorHandler.formatError(new Error('plain'))).toBe('plain');
    expect(ErrorHandler.formatError({ code: 'EISDIR', message: 'illegal operation' })).toBe('illegal operation');
    expect(ErrorHandler.formatError('text')).toBe('text');
  });
});
