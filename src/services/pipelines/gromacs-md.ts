import { logger } from '../../helpers/loggers.js'
import { GmxStepError } from '../../helpers/errors.js'
import {
  runPdb2gmx,
  runEditconf,
  runSolvate,
  runGenion,
  runMinimize,
  runNvt,
  runNpt,
  runProduction
} from '../functions/gmx-step-functions.js'
import { buildMdpParams } from '../functions/mdp-functions.js'
import { prepareOutputDir, writeRunManifestYaml } from '../functions/job-utils.js'
import type { MdRunManifest, MdRunParams, StepResult, StepStatus } from '../../types/index.js'

type PipelineStage = {
  description: string
  run: () => Promise<StepResult[]>
}

const buildManifest = (
  params: MdRunParams,
  status: StepStatus,
  started: Date,
  steps: StepResult[],
  error?: unknown
): MdRunManifest => ({
  status,
  started: started.toISOString(),
  finished: new Date().toISOString(),
  input_pdb: params.input_pdb,
  out_dir: params.out_dir,
  force_field: params.force_field,
  water_model: params.water_model,
  sim_time: params.sim_time.raw,
  sim_time_ns: params.sim_time.nanoseconds,
  total_steps: params.sim_time.totalSteps,
  steps,
  ...(error !== undefined
    ? { error: error instanceof Error ? error.message : String(error) }
    : {})
})

/**
 * Solvated-protein MD: topology, box, water, ions, EM, NVT, NPT, production.
 * Stops at the first failing command; `md_run.yaml` records what ran either way.
 */
const runMdPipeline = async (params: MdRunParams): Promise<StepResult[]> => {
  const started = new Date()
  const results: StepResult[] = []
  const mdp = buildMdpParams(params.sim_time.totalSteps)

  await prepareOutputDir(params)

  const stages: PipelineStage[] = [
    { description: 'Preparing protein structure', run: () => runPdb2gmx(params) },
    { description: 'Defining simulation box', run: () => runEditconf(params) },
    { description: 'Adding water', run: () => runSolvate(params) },
    { description: 'Adding ions', run: () => runGenion(params, mdp.ions) },
    { description: 'Energy minimization', run: () => runMinimize(params, mdp.em) },
    { description: 'NVT equilibration', run: () => runNvt(params, mdp.nvt) },
    { description: 'NPT equilibration', run: () => runNpt(params, mdp.npt) },
    { description: 'Running production MD', run: () => runProduction(params, mdp.md) }
  ]

  try {
    for (const [idx, stage] of stages.entries()) {
      logger.info(`${idx + 1}. ${stage.description}...`)
      results.push(...(await stage.run()))
    }
  } catch (error) {
    logger.error(`MD pipeline failed: ${error}`)
    if (error instanceof GmxStepError) results.push(...error.results)
    try {
      await writeRunManifestYaml(
        params.out_dir,
        buildManifest(params, 'Error', started, results, error)
      )
    } catch (manifestError) {
      logger.error(`Could not write run manifest: ${manifestError}`)
    }
    throw error
  }

  const manifestPath = await writeRunManifestYaml(
    params.out_dir,
    buildManifest(params, 'Success', started, results)
  )
  logger.info(`Run manifest written: ${manifestPath}`)
  return results
}

export { runMdPipeline }
