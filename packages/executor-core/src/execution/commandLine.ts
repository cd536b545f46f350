const SHELL_METACHARACTERS = new Set([
  '#',
  '&',
  ';',
  '`',
  '|',
  '*',
  '?',
  '~',
  '<',
  '>',
  '^',
  '(',
  ')',
  '[',
  ']',
  '{',
  '}',
  '$',
  '\\',
  '\n',
])

/**
 * Splits a command line into argv on single spaces.
 *
 * Quoting is not interpreted, so an argument cannot contain a space, and
 * consecutive spaces produce empty arguments.
 *
 * @param command Raw command line.
 * @returns Executable followed by its arguments.
 */
export const splitCommandLine = (command: string): readonly string[] => {
  return command.split(' ')
}

/**
 * Backslash-escapes shell metacharacters in a command line.
 *
 * Single and double quotes stay unescaped only when they appear in pairs.
 * The result still runs through a shell, so this is not a sandbox.
 *
 * @param command Raw command line.
 * @returns Escaped command line.
 */
export const escapeShellCommand = (command: string): string => {
  let escaped = ''
  let closingQuote: string | null = null

  for (let index = 0; index < command.length; index += 1) {
    const character = command.charAt(index)

    if (character === '"' || character === "'") {
      if (closingQuote === null && command.indexOf(character, index + 1) !== -1) {
        closingQuote = character
        escaped += character
        continue
      }

      if (closingQuote === character) {
        closingQuote = null
        escaped += character
        continue
      }

      escaped += `\\${character}`
      continue
    }

    escaped += SHELL_METACHARACTERS.has(character) ? `\\${character}` : character
  }

  return escaped
}
