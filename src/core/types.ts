export type Protocol = 'tcp' | 'udp'

export interface ListeningProcess {
  /** tcp | udp */
  readonly protocol: Protocol

  /** 0..65535 */
  readonly port: number

  /** Process id */
  readonly pid: number

  /** Best-effort process name; empty when it could not be resolved */
  readonly processName: string

  /** Local bind address (e.g. 127.0.0.1, 0.0.0.0, ::, *) */
  readonly address?: string
}

/** Result of one scan. Replaced wholesale on every refresh. */
export type Snapshot = readonly ListeningProcess[]

export interface KillResult {
  pid: number
  /** Signal or tool used, e.g. SIGTERM or taskkill */
  method: string
}

export type KillFailure = 'permission-denied' | 'no-such-process' | 'protected' | 'failed'
