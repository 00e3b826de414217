import { describe, it, expect, vi, beforeEach } from 'vitest'
import type { ChildProcess } from 'node:child_process'
import { EventEmitter } from 'node:events'
import { PassThrough } from 'node:stream'
import { spawn } from 'node:child_process'
import { runGmxStep } from './runGmxStep.js'

vi.mock('node:child_process', () => ({
  spawn: vi.fn()
}))

type FakeChild = EventEmitter & {
  stdin: PassThrough
  stdout: PassThrough
  stderr: PassThrough
  kill: ReturnType<typeof vi.fn>
}

const makeChild = (): FakeChild =>
  Object.assign(new EventEmitter(), {
    stdin: new PassThrough(),
    stdout: new PassThrough(),
    stderr: new PassThrough(),
    kill: vi.fn()
  })

describe('runGmxStep', () => {
  let child: FakeChild

  beforeEach(() => {
    vi.mocked(spawn).mockReset()
    child = makeChild()
    vi.mocked(spawn).mockReturnValue(child as unknown as ChildProcess)
  })

  const finish = (code: number | null, signal: NodeJS.Signals | null = null, delay = 10) =>
    setTimeout(() => {
      child.stdout.end()
      child.stderr.end()
      setTimeout(() => child.emit('close', code, signal), 5)
    }, delay)

  it('spawns gmx with the args, cwd and merged env', async () => {
    finish(0)
    await runGmxStep(['editconf', '-f', 'a.gro'], {
      gmxBin: 'gmx_mpi',
      cwd: '/tmp/run',
      env: { OMP_NUM_THREADS: '4' }
    })
    expect(spawn).toHaveBeenCalledWith(
      'gmx_mpi',
      ['editconf', '-f', 'a.gro'],
      expect.objectContaining({
        cwd: '/tmp/run',
        env: expect.objectContaining({ OMP_NUM_THREADS: '4' }),
        stdio: ['ignore', 'pipe', 'pipe']
      })
    )
  })

  it('defaults to the gmx binary', async () => {
    finish(0)
    await runGmxStep(['solvate'])
    expect(vi.mocked(spawn).mock.calls[0][0]).toBe('gmx')
  })

  it('pipes input to stdin and closes it', async () => {
    const chunks: string[] = []
    child.stdin.setEncoding('utf8')
    child.stdin.on('data', (chunk: string) => chunks.push(chunk))
    finish(0)
    await runGmxStep(['genion'], { input: '13\n' })
    expect(vi.mocked(spawn).mock.calls[0][2]).toEqual(
      expect.objectContaining({ stdio: ['pipe', 'pipe', 'pipe'] })
    )
    expect(chunks.join('')).toBe('13\n')
    expect(child.stdin.writableEnded).toBe(true)
  })

  it('calls onStdoutLine and onStderrLine for each line', async () => {
    const onStdoutLine = vi.fn()
    const onStderrLine = vi.fn()
    child.stdout.write('line1\nline2\r\nleftover')
    child.stderr.write('err1\n')
    finish(0)
    await runGmxStep(['mdrun'], { onStdoutLine, onStderrLine })
    expect(onStdoutLine.mock.calls).toEqual([['line1'], ['line2'], ['leftover']])
    expect(onStderrLine.mock.calls).toEqual([['err1']])
  })

  it('kills the process on timeout', async () => {
    finish(null, 'SIGTERM', 50)
    const result = await runGmxStep(['mdrun'], { timeoutMs: 10 })
    expect(child.kill).toHaveBeenCalledWith('SIGTERM')
    expect(result).toEqual({ code: null, signal: 'SIGTERM' })
  })

  it('returns the exit code and signal', async () => {
    finish(42, 'SIGUSR1')
    const result = await runGmxStep(['grompp'])
    expect(result).toEqual({ code: 42, signal: 'SIGUSR1' })
  })

  it('rejects when the process cannot be spawned', async () => {
    setTimeout(() => child.emit('error', new Error('spawn gmx ENOENT')), 10)
    await expect(runGmxStep(['pdb2gmx'])).rejects.toThrow('spawn gmx ENOENT')
  })
})
