import { describe, it, expect } from 'vitest';
import { splitRecord, splitRecordDetailed, resolveSplitOptions } from '../../../src/domain/services/RecordSplitter.js';

describe('splitRecord', () => {
  describe('unquoted fields', () => {
    it('should split on the delimiter', () => {
      expect(splitRecord('id,name,score')).toEqual(['id', 'name', 'score']);
    });

    it('should return no fields for an empty line', () => {
      expect(splitRecord('')).toEqual([]);
    });

    it('should return a single field when there is no delimiter', () => {
      expect(splitRecord('alone')).toEqual(['alone']);
    });

    it('should yield a trailing empty field after a trailing delimiter', () => {
      expect(splitRecord('a,b,')).toEqual(['a', 'b', '']);
    });

    it('should keep empty fields between delimiters', () => {
      expect(splitRecord(',,')).toEqual(['', '', '']);
      expect(splitRecord('1,,3')).toEqual(['1', '', '3']);
    });

    it('should keep surrounding whitespace verbatim', () => {
      expect(splitRecord(' a , b ')).toEqual([' a ', ' b ']);
    });

    it('should treat a quote in the middle of an unquoted field as a literal', () => {
      expect(splitRecord('ab"c,d')).toEqual(['ab"c', 'd']);
    });
  });

  describe('quoted fields', () => {
    it('should keep delimiters inside quotes', () => {
      expect(splitRecord('"1,000",2')).toEqual(['1,000', '2']);
    });

    it('should decode doubled quotes to one quote', () => {
      expect(splitRecord('"a,b""c"')).toEqual(['a,b"c']);
    });

    it('should decode an empty quoted field', () => {
      expect(splitRecord('"",x')).toEqual(['', 'x']);
    });

    it('should decode a field made only of an escaped quote', () => {
      expect(splitRecord('""""')).toEqual(['"']);
    });

    it('should skip characters between the closing quote and the next delimiter', () => {
      expect(splitRecord('"abc"garbage,next')).toEqual(['abc', 'next']);
    });

    it('should take the rest of the line for an unterminated quote', () => {
      expect(splitRecord('a,"unterminated, still going')).toEqual(['a', 'unterminated, still going']);
    });

    it('should yield a trailing empty field after a quoted field and a trailing delimiter', () => {
      expect(splitRecord('"a",')).toEqual(['a', '']);
    });

    it('should not treat a quote after leading whitespace as opening a quoted field', () => {
      expect(splitRecord(' "a,b"')).toEqual([' "a', 'b"']);
    });
  });

  describe('delimiter option', () => {
    it('should split on a custom delimiter', () => {
      expect(splitRecord('a;b,c;d', { delimiter: ';' })).toEqual(['a', 'b,c', 'd']);
    });

    it('should split on tabs', () => {
      expect(splitRecord('a\t"b\tc"', { delimiter: '\t' })).toEqual(['a', 'b\tc']);
    });
  });

  describe('maxColumns cap', () => {
    it('should stop splitting at the cap and report truncation', () => {
      const result = splitRecordDetailed('a,b,c,d', { maxColumns: 2 });
      expect(result.fields).toEqual(['a', 'b']);
      expect(result.truncated).toBe(true);
    });

    it('should not report truncation when the line has exactly maxColumns fields', () => {
      const result = splitRecordDetailed('a,b', { maxColumns: 2 });
      expect(result.fields).toEqual(['a', 'b']);
      expect(result.truncated).toBe(false);
    });

    it('should report truncation when only a trailing empty field is cut', () => {
      const result = splitRecordDetailed('a,b,', { maxColumns: 2 });
      expect(result.fields).toEqual(['a', 'b']);
      expect(result.truncated).toBe(true);
    });
  });
});

describe('resolveSplitOptions', () => {
  it('should default to a comma and 8192 columns', () => {
    expect(resolveSplitOptions()).toEqual({ delimiter: ',', maxColumns: 8192 });
  });

  it('should reject multi-character delimiters', () => {
    expect(() => resolveSplitOptions({ delimiter: '::' })).toThrow('delimiter must be a single character');
  });

  it('should reject the quote character as delimiter', () => {
    expect(() => resolveSplitOptions({ delimiter: '"' })).toThrow('cannot be used as a delimiter');
  });

  it('should reject line terminators as delimiter', () => {
    expect(() => resolveSplitOptions({ delimiter: '\n' })).toThrow('cannot be used as a delimiter');
  });

  it('should reject a non-positive maxColumns', () => {
    expect(() => resolveSplitOptions({ maxColumns: 0 })).toThrow('maxColumns must be a positive integer');
  });
});
