import { sanitizeForLog } from './logging.utils';

describe('sanitizeForLog', () => {
  it('should replace line breaks and tabs with spaces', () => {
    expect(sanitizeForLog('first\nsecond\tthird')).toBe('first second third');
  });

  it('should strip control characters', () => {
    expect(sanitizeForLog('bell\u0007 and del\u007f')).toBe('bell and del');
  });

  it('should truncate to the requested length', () => {
    expect(sanitizeForLog('reviews_cat-food.jsonl', 7)).toBe('reviews');
  });
});
