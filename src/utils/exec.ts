import { spawn } from 'node:child_process'

export interface ExecOptions {
  timeoutMs?: number
  /** Aborting kills the child and rejects with code ABORT_ERR. */
  signal?: AbortSignal
}

export interface ExecResult {
  cmd: string
  args: string[]
  stdout: string
  stderr: string
  code: number | null
}

/** Signature shared by `execFile` and the fakes scanners accept in its place. */
export type Exec = (cmd: string, args?: string[], options?: ExecOptions) => Promise<ExecResult>

export class ExecSpawnError extends Error {
  override name = 'ExecSpawnError'

  constructor(
    message: string,
    public readonly code?: string,
  ) {
    super(message)
  }
}

export class ExecTimeoutError extends Error {
  override name = 'ExecTimeoutError'
  constructor(public cmd: string, public timeoutMs: number) {
    super(`Command timed out after ${timeoutMs}ms: ${cmd}`)
  }
}

export const execFile: Exec = (cmd, args = [], options = {}) =>
  new Promise<ExecResult>((resolve, reject) => {
    const child = spawn(cmd, args, {
      windowsHide: true,
      stdio: ['ignore', 'pipe', 'pipe'],
      signal: options.signal,
    })

    const stdout: Buffer[] = []
    const stderr: Buffer[] = []

    let timedOut = false
    let timer: NodeJS.Timeout | undefined

    if (options.timeoutMs && options.timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true
        child.kill('SIGKILL')
      }, options.timeoutMs)
      timer.unref()
    }

    child.stdout.on('data', (d: Buffer) => stdout.push(d))
    child.stderr.on('data', (d: Buffer) => stderr.push(d))

    child.on('error', (err: NodeJS.ErrnoException) => {
      if (timer) clearTimeout(timer)
      reject(new ExecSpawnError(err.message, err.code))
    })

    child.on('close', (code) => {
      if (timer) clearTimeout(timer)

      if (timedOut) {
        reject(new ExecTimeoutError(cmd, options.timeoutMs ?? 0))
        return
      }

      resolve({
        cmd,
        args,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        code,
      })
    })
  })

/** Errno-style `code` of a thrown value, if it carries one. */
export function errorCode(err: unknown): string | undefined {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'string') return err.code
  return undefined
}

export function isCommandNotFound(err: unknown): boolean {
  return errorCode(err) === 'ENOENT'
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
