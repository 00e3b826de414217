import { logger } from '../../helpers/loggers.js'
import { runGmxStep, type RunGmxResult } from '../../helpers/runGmxStep.js'
import { GmxStepError } from '../../helpers/errors.js'
import { writeMdpFile } from './mdp-functions.js'
import type { MdRunParams, MdpName, MdpParams, StepResult } from '../../types/index.js'

type GmxCommand = {
  args: string[]
  input?: string
}

type StepContext = {
  step: number
  name: string
}

const runGmxCommand = async (
  params: MdRunParams,
  ctx: StepContext,
  command: GmxCommand
): Promise<StepResult> => {
  const [subcommand] = command.args
  const tag = `${ctx.name}:${subcommand}`
  logger.info(`${params.gmx_bin} ${command.args.join(' ')}`)
  const start = Date.now()
  const toStepResult = ({ code, signal }: RunGmxResult): StepResult => ({
    step: ctx.step,
    name: ctx.name,
    command: subcommand,
    code,
    signal,
    duration_ms: Date.now() - start
  })

  let result: RunGmxResult
  try {
    result = await runGmxStep(command.args, {
      gmxBin: params.gmx_bin,
      cwd: params.out_dir,
      input: command.input,
      timeoutMs: params.timeout_ms,
      onStdoutLine: (line) => logger.info(`[${tag}][stdout] ${line}`),
      // gmx writes its progress and notes to stderr
      onStderrLine: (line) => logger.warn(`[${tag}][stderr] ${line}`)
    })
  } catch (error) {
    logger.error(`Could not start ${params.gmx_bin} ${subcommand}: ${error}`)
    throw new GmxStepError(ctx.step, ctx.name, null, null, {
      cause: error,
      result: toStepResult({ code: null, signal: null })
    })
  }

  if (result.code !== 0 || result.signal) {
    throw new GmxStepError(ctx.step, ctx.name, result.code, result.signal, {
      result: toStepResult(result)
    })
  }

  return toStepResult(result)
}

const runCommands = async (
  params: MdRunParams,
  ctx: StepContext,
  commands: GmxCommand[]
): Promise<StepResult[]> => {
  const results: StepResult[] = []
  try {
    for (const command of commands) {
      results.push(await runGmxCommand(params, ctx, command))
    }
  } catch (error) {
    if (error instanceof GmxStepError) error.results.unshift(...results)
    throw error
  }
  return results
}

const grompp = (mdp: MdpName, coords: string, topol: string, tpr: string, extra: string[] = []) => ({
  args: ['grompp', '-f', `${mdp}.mdp`, '-c', coords, ...extra, '-p', topol, '-o', tpr]
})

const mdrun = (deffnm: string) => ({ args: ['mdrun', '-v', '-deffnm', deffnm] })

const topol = (params: MdRunParams) => `${params.basename}_topol.top`

const runPdb2gmx = (params: MdRunParams) => {
  const b = params.basename
  return runCommands(params, { step: 1, name: 'pdb2gmx' }, [
    {
      args: [
        'pdb2gmx',
        '-f', `${b}.pdb`,
        '-o', `${b}_processed.gro`,
        '-p', topol(params),
        '-water', params.water_model,
        '-ff', params.force_field,
        '-ignh',
        '-ter'
      ]
    }
  ])
}

const runEditconf = (params: MdRunParams) => {
  const b = params.basename
  return runCommands(params, { step: 2, name: 'editconf' }, [
    { args: ['editconf', '-f', `${b}_processed.gro`, '-o', `${b}_box.gro`, '-c', '-d', '1.0', '-bt', 'cubic'] }
  ])
}

const runSolvate = (params: MdRunParams) => {
  const b = params.basename
  return runCommands(params, { step: 3, name: 'solvate' }, [
    { args: ['solvate', '-cp', `${b}_box.gro`, '-cs', 'spc216.gro', '-o', `${b}_solv.gro`, '-p', topol(params)] }
  ])
}

const runGenion = async (params: MdRunParams, mdp: MdpParams) => {
  const b = params.basename
  await writeMdpFile('ions', mdp, params.out_dir)
  return runCommands(params, { step: 4, name: 'genion' }, [
    grompp('ions', `${b}_solv.gro`, topol(params), `${b}_ions.tpr`),
    {
      args: [
        'genion',
        '-s', `${b}_ions.tpr`,
        '-o', `${b}_solv_ions.gro`,
        '-p', topol(params),
        '-pname', 'NA',
        '-nname', 'CL',
        '-neutral'
      ],
      input: `${params.genion_group}\n`
    }
  ])
}

const runMinimize = async (params: MdRunParams, mdp: MdpParams) => {
  const b = params.basename
  await writeMdpFile('em', mdp, params.out_dir)
  return runCommands(params, { step: 5, name: 'minimize' }, [
    grompp('em', `${b}_solv_ions.gro`, topol(params), `${b}_em.tpr`),
    mdrun(`${b}_em`)
  ])
}

const runNvt = async (params: MdRunParams, mdp: MdpParams) => {
  const b = params.basename
  await writeMdpFile('nvt', mdp, params.out_dir)
  return runCommands(params, { step: 6, name: 'nvt' }, [
    grompp('nvt', `${b}_em.gro`, topol(params), `${b}_nvt.tpr`, ['-r', `${b}_em.gro`]),
    mdrun(`${b}_nvt`)
  ])
}

const runNpt = async (params: MdRunParams, mdp: MdpParams) => {
  const b = params.basename
  await writeMdpFile('npt', mdp, params.out_dir)
  return runCommands(params, { step: 7, name: 'npt' }, [
    grompp('npt', `${b}_nvt.gro`, topol(params), `${b}_npt.tpr`, [
      '-r', `${b}_nvt.gro`,
      '-t', `${b}_nvt.cpt`
    ]),
    mdrun(`${b}_npt`)
  ])
}

const runProduction = async (params: MdRunParams, mdp: MdpParams) => {
  const b = params.basename
  await writeMdpFile('md', mdp, params.out_dir)
  return runCommands(params, { step: 8, name: 'md' }, [
    grompp('md', `${b}_npt.gro`, topol(params), `${b}_md.tpr`, ['-t', `${b}_npt.cpt`]),
    mdrun(`${b}_md`)
  ])
}

export {
  runPdb2gmx,
  runEditconf,
  runSolvate,
  runGenion,
  runMinimize,
  runNvt,
  runNpt,
  runProduction
}
