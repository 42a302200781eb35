import { DEFAULT_PACKAGE_NAME, packageNameFor, sanitizeFilename } from './filename';

describe('filename', () => {
  describe('sanitizeFilename', () => {
    it('should replace unsafe characters and trim trailing separators', () => {
      expect(sanitizeFilename('Unit 3: Forces?')).toBe('Unit 3_ Forces');
    });

    it('should collapse runs of the replacement', () => {
      expect(sanitizeFilename('a<>b')).toBe('a_b');
    });

    it('should trim leading and trailing dots', () => {
      expect(sanitizeFilename('..hidden..')).toBe('hidden');
    });

    it('should suffix reserved device names', () => {
      expect(sanitizeFilename('con')).toBe('con_file');
      expect(sanitizeFilename('LPT1')).toBe('LPT1_file');
    });

    it('should cap the length at 100 characters', () => {
      expect(sanitizeFilename('a'.repeat(150))).toBe('a'.repeat(100));
    });

    it('should fall back to a default name when nothing is left', () => {
      expect(sanitizeFilename('???')).toBe(DEFAULT_PACKAGE_NAME);
      expect(sanitizeFilename('')).toBe(DEFAULT_PACKAGE_NAME);
    });
  });

  describe('packageNameFor', () => {
    it('should replace whitespace with underscores', () => {
      expect(packageNameFor('Unit 3: Forces?')).toBe('Unit_3_Forces');
    });

    it('should keep a simple title', () => {
      expect(packageNameFor('Midterm')).toBe('Midterm');
    });
  });
});
