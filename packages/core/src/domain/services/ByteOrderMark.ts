/** U+FEFF, the decoded form of the UTF-8 byte sequence `EF BB BF`. */
export const BYTE_ORDER_MARK = '\uFEFF';

/** Drop a leading byte-order mark. Only ever applied to the first line of an input. */
export function stripBom(line: string): string {
  return line.startsWith(BYTE_ORDER_MARK) ? line.slice(BYTE_ORDER_MARK.length) : line;
}
