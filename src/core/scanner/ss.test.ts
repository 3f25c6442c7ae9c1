import { describe, expect, it } from 'vitest'

import { fakeExec } from '../../testing/fakes'
import { listWithSs, parseSs } from './ss'

const SS_TCP = [
  'LISTEN 0      4096   127.0.0.53%lo:53        0.0.0.0:*    users:(("systemd-resolve",pid=612,fd=14))',
  'LISTEN 0      511    0.0.0.0:80              0.0.0.0:*    users:(("nginx",pid=900,fd=6),("nginx",pid=901,fd=6))',
  'LISTEN 0      128    [::]:22                 [::]:*',
  'LISTEN 0      4096   *:5173                  *:*          users:(("node",pid=4242,fd=23))',
].join('\n')

describe('parseSs', () => {
  it('parses one record per owning process and skips rows without one', () => {
    expect(parseSs(SS_TCP, 'tcp')).toEqual([
      { protocol: 'tcp', port: 53, pid: 612, processName: 'systemd-resolve', address: '127.0.0.53%lo' },
      { protocol: 'tcp', port: 80, pid: 900, processName: 'nginx', address: '0.0.0.0' },
      { protocol: 'tcp', port: 80, pid: 901, processName: 'nginx', address: '0.0.0.0' },
      { protocol: 'tcp', port: 5173, pid: 4242, processName: 'node', address: '*' },
    ])
  })

  it('ignores a header line', () => {
    const out = 'State  Recv-Q Send-Q Local Address:Port Peer Address:Port Process\n'
    expect(parseSs(out, 'tcp')).toEqual([])
  })

  it('tags UDP rows', () => {
    const out = 'UNCONN 0 0 0.0.0.0:68 0.0.0.0:* users:(("dhclient",pid=77,fd=7))'
    expect(parseSs(out, 'udp')).toEqual([
      { protocol: 'udp', port: 68, pid: 77, processName: 'dhclient', address: '0.0.0.0' },
    ])
  })
})

describe('listWithSs', () => {
  it('combines TCP and UDP listings', async () => {
    const run = fakeExec({
      'ss -H -ltnp': { stdout: 'LISTEN 0 511 0.0.0.0:80 0.0.0.0:* users:(("nginx",pid=900,fd=6))\n' },
      'ss -H -lunp': { stdout: 'UNCONN 0 0 0.0.0.0:68 0.0.0.0:* users:(("dhclient",pid=77,fd=7))\n' },
    })

    const res = await listWithSs(run)
    expect(res.ok && res.records.map((l) => `${l.protocol}:${l.port}`)).toEqual(['tcp:80', 'udp:68'])
  })

  it('fails when ss is missing', async () => {
    expect(await listWithSs(fakeExec({}))).toEqual({ ok: false, reason: 'ss not found' })
  })
})
