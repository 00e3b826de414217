import { spawn } from 'node:child_process'
import { once } from 'node:events'
import readline from 'node:readline'

export interface RunGmxOptions {
  gmxBin?: string
  cwd?: string
  env?: NodeJS.ProcessEnv
  input?: string // written to stdin, then stdin is closed
  timeoutMs?: number
  onStdoutLine?: (line: string) => void
  onStderrLine?: (line: string) => void
  killSignal?: NodeJS.Signals | number
}

export interface RunGmxResult {
  code: number | null
  signal: NodeJS.Signals | null
}

export async function runGmxStep(
  args: string[],
  opts: RunGmxOptions = {}
): Promise<RunGmxResult> {
  const {
    gmxBin = 'gmx',
    cwd,
    env,
    input,
    timeoutMs,
    onStdoutLine,
    onStderrLine,
    killSignal = 'SIGTERM'
  } = opts

  const child = spawn(gmxBin, args, {
    cwd,
    env: { ...process.env, ...env },
    stdio: [input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe']
  })

  // once() rejects on 'error', so a missing binary (ENOENT) rejects here
  const closeP = once(child, 'close')

  if (input !== undefined && child.stdin) {
    child.stdin.on('error', (err) => onStderrLine?.(`stdin: ${err.message}`))
    child.stdin.end(input)
  }

  let rlOut: readline.Interface | undefined
  let rlErr: readline.Interface | undefined
  if (child.stdout) {
    rlOut = readline.createInterface({ input: child.stdout })
    rlOut.on('line', (line) => onStdoutLine?.(line.replace(/\r$/, '')))
  }
  if (child.stderr) {
    rlErr = readline.createInterface({ input: child.stderr })
    rlErr.on('line', (line) => onStderrLine?.(line.replace(/\r$/, '')))
  }

  let termTimer: NodeJS.Timeout | undefined
  let killTimer: NodeJS.Timeout | undefined
  if (timeoutMs && timeoutMs > 0) {
    termTimer = setTimeout(() => {
      child.kill(killSignal)
      killTimer = setTimeout(() => child.kill('SIGKILL'), 5000)
    }, timeoutMs)
  }

  try {
    const [code, signal] = await closeP
    return { code, signal }
  } finally {
    if (termTimer) clearTimeout(termTimer)
    if (killTimer) clearTimeout(killTimer)
    rlOut?.close()
    rlErr?.close()
  }
}
