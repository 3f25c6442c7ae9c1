import type { Protocol } from '../core/types'

export interface CLIFlags {
  help: boolean
  version: boolean
  tcp: boolean
  udp: boolean
  /** Ask y/n before killing. */
  confirm: boolean
}

export interface ParsedArgs {
  flags: CLIFlags
  unknown: string[]
}

export function resolveProtocols(flags: Pick<CLIFlags, 'tcp' | 'udp'>): Protocol[] {
  if (flags.tcp && !flags.udp) return ['tcp']
  if (flags.udp && !flags.tcp) return ['udp']
  return ['tcp', 'udp']
}

const FLAG_ALIASES: Record<string, keyof CLIFlags> = {
  '-h': 'help',
  '--help': 'help',
  '-v': 'version',
  '--version': 'version',
  '--tcp': 'tcp',
  '--udp': 'udp',
  '-c': 'confirm',
  '--confirm': 'confirm',
}

export function parseArgs(argv: readonly string[]): ParsedArgs {
  const flags: CLIFlags = {
    help: false,
    version: false,
    tcp: false,
    udp: false,
    confirm: false,
  }
  const unknown: string[] = []

  // Everything is a boolean switch; the program takes no positional arguments.
  for (const a of argv) {
    const flag = Object.prototype.hasOwnProperty.call(FLAG_ALIASES, a) ? FLAG_ALIASES[a] : undefined
    if (flag) flags[flag] = true
    else unknown.push(a)
  }

  return { flags, unknown }
}
