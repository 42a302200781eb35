import { textSimilarity } from './text-similarity';

describe('text-similarity', () => {
  describe('textSimilarity', () => {
    it('should score identical text as 1', () => {
      expect(textSimilarity('What is 2 + 2?', 'What is 2 + 2?')).toBe(1);
    });

    it('should ignore case and repeated whitespace', () => {
      expect(textSimilarity('Hello  World', ' hello world')).toBe(1);
    });

    it('should score shared bigrams with the Dice coefficient', () => {
      expect(textSimilarity('night', 'nacht')).toBe(0.25);
    });

    it('should score unrelated text as 0', () => {
      expect(textSimilarity('abc', 'xyz')).toBe(0);
    });

    it('should score empty text as 0', () => {
      expect(textSimilarity('', 'anything')).toBe(0);
      expect(textSimilarity('   ', '   ')).toBe(0);
    });

    it('should score different single characters as 0', () => {
      expect(textSimilarity('4', '5')).toBe(0);
    });
  });
});
