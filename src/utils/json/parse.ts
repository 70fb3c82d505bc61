/**
 * Interprets a command-line value: JSON literals (numbers, booleans, null,
 * quoted strings, arrays, objects) are parsed, anything else is kept as text.
 */
export function parseValueLiteral(input: string): unknown {
  try {
    return JSON.parse(input);
  } catch {
    return input;
  }
}
