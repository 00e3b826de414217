import yargs from 'yargs'
import fs from 'fs-extra'
import { logger } from './helpers/loggers.js'
import { SimulationTimeError } from './helpers/errors.js'
import { parseSimulationTime, DEFAULT_SIM_TIME } from './services/functions/time-utils.js'
import { createMdRunParams } from './services/functions/job-utils.js'
import { runMdPipeline } from './services/pipelines/gromacs-md.js'

const USAGE = 'Usage: gmx-md -i input.pdb -o output_dir [-t simulation_time (e.g., 100ns)]'

class UsageError extends Error {}

const parseArgs = (argv: string[]) =>
  yargs(argv)
    .scriptName('gmx-md')
    .usage(USAGE)
    .options({
      i: { alias: 'input', type: 'string', describe: 'Input structure (.pdb)' },
      o: { alias: 'output', type: 'string', describe: 'Output directory' },
      t: {
        alias: 'time',
        type: 'string',
        default: DEFAULT_SIM_TIME,
        describe: 'Simulation time, <number><ns|ps|us|ms>'
      },
      h: { alias: 'help', type: 'boolean', default: false }
    })
    .parserConfiguration({ 'duplicate-arguments-array': false })
    .help(false)
    .version(false)
    .strict()
    .exitProcess(false)
    .fail((msg, err) => {
      throw err ?? new UsageError(msg)
    })
    .parseSync()

/**
 * Runs the CLI against `argv` (without the node and script entries) and
 * returns the process exit code.
 */
const main = async (argv: string[]): Promise<number> => {
  let args: ReturnType<typeof parseArgs>
  try {
    args = parseArgs(argv)
  } catch (error) {
    logger.error(`Error: ${error instanceof Error ? error.message : error}`)
    logger.info(USAGE)
    return 1
  }

  if (args.h) {
    logger.info(USAGE)
    return 0
  }

  if (!args.i || !args.o) {
    logger.error('Error: Missing required arguments')
    logger.info(USAGE)
    return 1
  }

  try {
    const simTime = parseSimulationTime(args.t)
    if (!(await fs.pathExists(args.i))) {
      logger.error(`Error: Input file not found: ${args.i}`)
      return 1
    }

    const params = createMdRunParams(args.i, args.o, simTime)
    logger.info(
      `Preparing to run MD simulation for ${simTime.raw} (${simTime.nanoseconds} ns, ${simTime.totalSteps} steps)`
    )

    await runMdPipeline(params)
    logger.info(`MD simulation completed. Results saved in ${params.out_dir}`)
    return 0
  } catch (error) {
    if (error instanceof SimulationTimeError) {
      logger.error(`Error: ${error.message}`)
    } else {
      logger.error(`MD simulation failed: ${error instanceof Error ? error.message : error}`)
    }
    return 1
  }
}

export { main, USAGE }
