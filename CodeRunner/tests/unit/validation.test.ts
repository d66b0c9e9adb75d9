import { describe, it, expect } from 'vitest';
import { join } from 'node:path';
import { ValidationError } from '@coderunner/shared/Types/errors.js';
import { validateRunRequest } from '../../src/validation/request.js';
import {
  InvalidFilenameError,
  InvalidPayloadError,
  MissingFieldError,
  UnsupportedLanguageError,
} from '../../src/validation/errors.js';
import { Workspace } from '../../src/workspace/workspace.js';

// Validation never touches the disk, so the root does not have to exist
const workspace = new Workspace(join('/nonexistent', 'coderunner-validation'));

describe('validateRunRequest', () => {
  it('should accept a complete request', () => {
    expect(
      validateRunRequest({ code: 'print(1)', filename: 'a.py', language: 'python' }, workspace),
    ).toEqual({ code: 'print(1)', filename: 'a.py', language: 'python' });
  });

  it('should default language to python', () => {
    expect(validateRunRequest({ code: 'print(1)', filename: 'a.py' }, workspace).language).toBe('python');
    expect(
      validateRunRequest({ code: 'print(1)', filename: 'a.py', language: null }, workspace).language,
    ).toBe('python');
  });

  it('should ignore unknown fields', () => {
    expect(
      validateRunRequest({ code: 'x', filename: 'a.py', extra: true }, workspace),
    ).toEqual({ code: 'x', filename: 'a.py', language: 'python' });
  });

  describe('payload shape', () => {
    it.each([
      ['array', [1, 2]],
      ['string', 'print(1)'],
      ['null', null],
      ['undefined', undefined],
    ])('should reject a %s body', (_label, body) => {
      expect(() => validateRunRequest(body, workspace)).toThrow(InvalidPayloadError);
      expect(() => validateRunRequest(body, workspace)).toThrow('Invalid JSON payload');
    });

    it('should reject non-string fields', () => {
      try {
        validateRunRequest({ code: 42, filename: 'a.py' }, workspace);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidPayloadError);
        expect(err).toMatchObject({
          message: "Invalid field type: 'code' must be a string",
          code: 'INVALID_PAYLOAD',
          details: { fields: ['code'] },
        });
      }
    });
  });

  describe('missing fields', () => {
    it('should name a missing filename', () => {
      expect(() => validateRunRequest({ code: 'print(1)' }, workspace)).toThrow(
        "Missing required field: 'filename'",
      );
    });

    it('should treat empty strings as missing', () => {
      expect(() => validateRunRequest({ code: '', filename: 'a.py' }, workspace)).toThrow(
        "Missing required field: 'code'",
      );
    });

    it('should list every missing field', () => {
      try {
        validateRunRequest({}, workspace);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(MissingFieldError);
        expect(err).toBeInstanceOf(ValidationError);
        expect(err).toMatchObject({
          message: "Missing required fields: 'code', 'filename'",
          code: 'MISSING_FIELD',
          fields: ['code', 'filename'],
        });
      }
    });

    it('should report missing fields before language or filename problems', () => {
      expect(() =>
        validateRunRequest({ filename: '../x.rb', language: 'ruby' }, workspace),
      ).toThrow(MissingFieldError);
    });
  });

  describe('language', () => {
    it('should reject unsupported languages', () => {
      try {
        validateRunRequest({ code: "puts 'hi'", filename: 'a.rb', language: 'ruby' }, workspace);
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(UnsupportedLanguageError);
        expect(err).toMatchObject({
          message: 'Unsupported language: ruby',
          code: 'UNSUPPORTED_LANGUAGE',
          details: { language: 'ruby', supported: ['python'] },
        });
      }
    });

    it('should check language before the filename', () => {
      expect(() =>
        validateRunRequest({ code: 'x', filename: '../x.sh', language: 'bash' }, workspace),
      ).toThrow(UnsupportedLanguageError);
    });
  });

  describe('filename', () => {
    it.each([
      ['../evil_script.py', 'Invalid filename: directory separators are not allowed'],
      ['sub/dir.py', 'Invalid filename: directory separators are not allowed'],
      ['sub\\dir.py', 'Invalid filename: directory separators are not allowed'],
      ['/etc/passwd', 'Invalid filename: directory separators are not allowed'],
      ['..', 'Invalid filename: parent directory references are not allowed'],
      ['..hidden.py', 'Invalid filename: parent directory references are not allowed'],
      ['a\0.py', 'Invalid filename: contains a NUL byte'],
      ['.', 'Invalid filename: path escapes the workspace'],
    ])('should reject %j', (filename, message) => {
      expect(() => validateRunRequest({ code: 'print(1)', filename }, workspace)).toThrow(
        InvalidFilenameError,
      );
      expect(() => validateRunRequest({ code: 'print(1)', filename }, workspace)).toThrow(message);
    });

    it('should accept dotfiles and non-ASCII names', () => {
      expect(validateRunRequest({ code: 'x', filename: '.hidden.py' }, workspace).filename).toBe('.hidden.py');
      expect(validateRunRequest({ code: 'x', filename: 'résumé.py' }, workspace).filename).toBe('résumé.py');
    });
  });
});
