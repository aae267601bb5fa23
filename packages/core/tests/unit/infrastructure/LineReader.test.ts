import { describe, it, expect, vi } from 'vitest';
import { LineReader } from '../../../src/infrastructure/lines/LineReader.js';

function readAll(reader: LineReader, chunks: string[]): string[] {
  const lines: string[] = [];
  for (const chunk of chunks) lines.push(...reader.push(chunk));
  lines.push(...reader.end());
  return lines;
}

describe('LineReader', () => {
  it('should split on newlines and drop the empty remainder after the last one', () => {
    expect(readAll(new LineReader(), ['a,b\n1,2\n'])).toEqual(['a,b', '1,2']);
  });

  it('should flush a last line without a newline', () => {
    expect(readAll(new LineReader(), ['a,b\n1,2'])).toEqual(['a,b', '1,2']);
  });

  it('should strip carriage returns before the newline', () => {
    expect(readAll(new LineReader(), ['a,b\r\n1,2\r\n'])).toEqual(['a,b', '1,2']);
  });

  it('should keep a carriage return in the middle of a line', () => {
    expect(readAll(new LineReader(), ['a\rb\n'])).toEqual(['a\rb']);
  });

  it('should reassemble lines split across chunks', () => {
    expect(readAll(new LineReader(), ['id,na', 'me\n1,', 'Al', 'ice\r', '\n2,Bob'])).toEqual([
      'id,name',
      '1,Alice',
      '2,Bob',
    ]);
  });

  it('should return blank lines as empty strings', () => {
    expect(readAll(new LineReader(), ['a\n\n\nb\n'])).toEqual(['a', '', '', 'b']);
  });

  it('should yield nothing for empty input', () => {
    expect(readAll(new LineReader(), [''])).toEqual([]);
  });

  it('should yield one empty line for a lone newline', () => {
    expect(readAll(new LineReader(), ['\n'])).toEqual(['']);
  });

  it('should count lines read', () => {
    const reader = new LineReader();
    readAll(reader, ['a\nb\nc']);
    expect(reader.linesRead).toBe(3);
  });

  describe('maxLineLength', () => {
    it('should cut long lines and keep the following lines intact', () => {
      const onTruncated = vi.fn();
      const reader = new LineReader(4, onTruncated);
      expect(readAll(reader, ['ab\nabcdefgh\nxy\n'])).toEqual(['ab', 'abcd', 'xy']);
      expect(onTruncated).toHaveBeenCalledOnce();
      expect(onTruncated).toHaveBeenCalledWith(2);
    });

    it('should cut a long line that spans several chunks', () => {
      const onTruncated = vi.fn();
      const reader = new LineReader(3, onTruncated);
      expect(readAll(reader, ['ab', 'cd', 'ef\nok'])).toEqual(['abc', 'ok']);
      expect(onTruncated).toHaveBeenCalledWith(1);
    });

    it('should not report a line of exactly maxLineLength', () => {
      const onTruncated = vi.fn();
      expect(readAll(new LineReader(3, onTruncated), ['abc\n'])).toEqual(['abc']);
      expect(onTruncated).not.toHaveBeenCalled();
    });

    it('should reject a non-positive maxLineLength', () => {
      expect(() => new LineReader(0)).toThrow('maxLineLength must be a positive integer');
    });
  });
});
