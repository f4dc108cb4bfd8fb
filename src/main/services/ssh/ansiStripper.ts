/**
 * ansiStripper
 *
 * Strips terminal escape sequences from interactive shell output before it is
 * matched against prompts or stored in a result.
 *
 * Handles:
 *   - CSI sequences:  ESC [ … <letter>      (colors, cursor movement, erase)
 *   - OSC sequences:  ESC ] … ST            (window title, hyperlinks)
 *   - Simple escapes: ESC <char>
 *   - Backspace overstrikes some devices emit around "--More--"
 *   - Carriage-return overwrites inside a line
 */

const CSI_REGEX = /\x1b\[[0-9;?]*[A-Za-z]/g;
const OSC_REGEX = /\x1b\][^\x07\x1b]*(?:\x07|\x1b\\)/g;

/** CSI-only strip, used on prompt-matching copies of a buffer. */
export function stripCsi(input: string): string {
  return input.replace(CSI_REGEX, '');
}

export function stripAnsi(input: string): string {
  let result = input
    .replace(CSI_REGEX, '')
    .replace(OSC_REGEX, '')
    .replace(/\x1b[^[\]]/g, '')
    .replace(/\x1b/g, '')
    .replace(/[^\n]\x08/g, '')
    .replace(/\x08/g, '');

  result = result
    .replace(/\r\n/g, '\n')
    .split('\n')
    .map((line) => {
      if (!line.includes('\r')) return line;
      const segments = line.split('\r');
      for (let i = segments.length - 1; i >= 0; i--) {
        if (segments[i].trim()) return segments[i];
      }
      return segments[segments.length - 1];
    })
    .join('\n');

  return result;
}
