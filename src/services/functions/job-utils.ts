import fs from 'fs-extra'
import path from 'path'
import YAML from 'yaml'
import { logger } from '../../helpers/loggers.js'
import { config } from '../../config/config.js'
import type { MdRunManifest, MdRunParams, SimulationTime } from '../../types/index.js'

const MANIFEST_FILE = 'md_run.yaml'

const createMdRunParams = (
  inputPdb: string,
  outDir: string,
  simTime: SimulationTime
): MdRunParams => ({
  input_pdb: path.resolve(inputPdb),
  out_dir: path.resolve(outDir),
  basename: path.basename(inputPdb, '.pdb'),
  force_field: config.forceField,
  water_model: config.waterModel,
  sim_time: simTime,
  gmx_bin: config.gmxBin,
  genion_group: config.genionGroup,
  timeout_ms: config.stepTimeoutMs
})

const makeDir = async (directory: string) => {
  await fs.ensureDir(directory)
  logger.info(`Create Dir: ${directory}`)
}

/**
 * Create the run directory and copy the input structure into it as `<basename>.pdb`.
 * Returns the path of the copy.
 */
const prepareOutputDir = async (params: MdRunParams): Promise<string> => {
  if (!(await fs.pathExists(params.input_pdb))) {
    throw new Error(`Input structure not found: ${params.input_pdb}`)
  }
  await makeDir(params.out_dir)
  const dest = path.join(params.out_dir, `${params.basename}.pdb`)
  if (dest !== params.input_pdb) {
    await fs.copy(params.input_pdb, dest)
    logger.info(`Copied ${params.input_pdb} to ${dest}`)
  }
  return dest
}

const writeRunManifestYaml = async (
  dir: string,
  manifest: MdRunManifest,
  filename = MANIFEST_FILE
): Promise<string> => {
  const filePath = path.join(dir, filename)
  await fs.ensureDir(dir)

  // Sorted keys for diff-friendly output, no wrapping so paths stay intact
  const yamlText = YAML.stringify(manifest, {
    sortMapEntries: true,
    lineWidth: 0
  })

  const tmpPath = `${filePath}.tmp`
  await fs.writeFile(tmpPath, yamlText, 'utf8')
  await fs.rename(tmpPath, filePath)

  return filePath
}

export { createMdRunParams, makeDir, prepareOutputDir, writeRunManifestYaml, MANIFEST_FILE }
