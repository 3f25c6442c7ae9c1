import { describe, expect, it } from 'vitest'

import { parseArgs, resolveProtocols } from './args'

describe('parseArgs', () => {
  it('defaults every switch to off', () => {
    expect(parseArgs([])).toEqual({
      flags: { help: false, version: false, tcp: false, udp: false, confirm: false },
      unknown: [],
    })
  })

  it('reads short and long switches', () => {
    const { flags, unknown } = parseArgs(['--tcp', '-c', '-v'])
    expect(flags).toEqual({ help: false, version: true, tcp: true, udp: false, confirm: true })
    expect(unknown).toEqual([])
  })

  it('collects anything it does not know', () => {
    expect(parseArgs(['3000', '--kill', '-h']).unknown).toEqual(['3000', '--kill'])
    expect(parseArgs(['__proto__', 'toString']).unknown).toEqual(['__proto__', 'toString'])
  })
})

describe('resolveProtocols', () => {
  it('narrows to one protocol only when one is asked for', () => {
    expect(resolveProtocols({ tcp: true, udp: false })).toEqual(['tcp'])
    expect(resolveProtocols({ tcp: false, udp: true })).toEqual(['udp'])
    expect(resolveProtocols({ tcp: true, udp: true })).toEqual(['tcp', 'udp'])
    expect(resolveProtocols({ tcp: false, udp: false })).toEqual(['tcp', 'udp'])
  })
})
