export enum Conjunction {
  AND = 'and',
  OR = 'or',
}

/**
 * Converts the array of string items to a single textual string where elements are
 * comma-separated, and an "and" is inserted as necessary., e.g.
 * `['a'] => 'a'`
 * `['a', 'b'] => 'a and b'`
 * `['a', 'b', 'c'] => 'a, b, and c'`
 *
 * Oxford commas are used.
 *
 * @param items - The items to be converted to text
 * @param joinWord - The conjunction placed before the last item
 * @returns The resulting textual string
 */
export function listToText(items: string[], joinWord = Conjunction.AND): string {
  switch (items.length) {
    case 0: return '';
    case 1: return items[0];
    case 2: return items.join(` ${joinWord} `);
    default: {
      const result = items.concat(); // Copies the array
      result[result.length - 1] = `${joinWord} ${result[result.length - 1]}`;
      return result.join(', ');
    }
  }
}

/**
 * Returns true if a string is an integer.
 * @param value - the value to check
 * @returns true if it is an integer and false otherwise
 */
export function isInteger(value: string): boolean {
  return /^-?\d+$/.test(value);
}

/**
 * Returns true if a string is a decimal number that is not an integer.
 * @param value - the value to check
 * @returns true if it is a float and false otherwise
 */
export function isFloat(value: string): boolean {
  return /^-?\d*\.\d+$/.test(value);
}

/**
 * Returns true if a string is 'true' or 'false' in any case.
 * @param value - the value to check
 */
export function isBoolean(value: string): boolean {
  return /^(true|false)$/i.test(value);
}

/**
 * Parses 'true' / 'false' in any case.
 * @param value - the value to parse
 */
export function parseBoolean(value: string): boolean {
  return value.toLowerCase() === 'true';
}
