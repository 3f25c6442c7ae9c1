const ESC = '\u001B['

export const ansi = {
  clearScreen: `${ESC}2J`,

  hideCursor: `${ESC}?25l`,
  showCursor: `${ESC}?25h`,

  /** Enable the terminal's alternate screen buffer */
  altScreenEnter: `${ESC}?1049h`,
  /** Restore the main screen buffer */
  altScreenExit: `${ESC}?1049l`,
} as const

/** Raw input sequences the terminal sends for keys we bind. */
export const keys = {
  up: `${ESC}A`,
  down: `${ESC}B`,
  ctrlC: '\u0003',
  esc: '\u001B',
  enter: '\r',
  newline: '\n',
} as const

export function cursorTo(x: number, y: number): string {
  // 1-indexed
  return `${ESC}${y + 1};${x + 1}H`
}

const KEY_PATTERN = /\u001B\[[0-9;]*[A-Za-z~]|[\s\S]/gu

/** Split one input chunk into key presses; fast typing and pastes arrive together. */
export function splitKeys(chunk: string): string[] {
  return chunk.match(KEY_PATTERN) ?? []
}
