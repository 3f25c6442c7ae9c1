/**
 * Terminal symbols, ASCII where the terminal might not cope with more.
 */
export const symbols = {
  err: 'x',
  info: 'i',
  step: '>',
  dot: '·',
  ellipsis: '…',
} as const
