import fs from 'fs-extra'
import path from 'path'
import Handlebars from 'handlebars'
import { logger } from '../../helpers/loggers.js'
import { config } from '../../config/config.js'
import { TIMESTEP_PS } from './time-utils.js'
import type { MdpName, MdpParams } from '../../types/index.js'

const EQUILIBRATION_STEPS = 50000
const REF_TEMPERATURE_K = 300

const buildMdpParams = (totalSteps: number): Record<MdpName, MdpParams> => ({
  ions: { nsteps: 500, emtol: '1000.0' },
  em: { nsteps: 50000, emtol: '1000.0', emstep: 0.01 },
  nvt: {
    nsteps: EQUILIBRATION_STEPS,
    dt: TIMESTEP_PS,
    nstout: 500,
    ref_t: REF_TEMPERATURE_K
  },
  npt: {
    nsteps: EQUILIBRATION_STEPS,
    dt: TIMESTEP_PS,
    nstout: 500,
    ref_t: REF_TEMPERATURE_K
  },
  md: {
    nsteps: totalSteps,
    dt: TIMESTEP_PS,
    nstout: 5000,
    ref_t: REF_TEMPERATURE_K
  }
})

const readTemplate = async (
  name: MdpName,
  templateDir = config.mdpTemplateDir
): Promise<string> => {
  const templateFile = path.join(templateDir, `${name}.mdp.handlebars`)
  return fs.readFile(templateFile, 'utf8')
}

const renderMdp = (template: string, params: MdpParams): string =>
  Handlebars.compile(template, { noEscape: true, strict: true })(params)

/**
 * Render `<name>.mdp` into `outDir` and return its path.
 */
const writeMdpFile = async (
  name: MdpName,
  params: MdpParams,
  outDir: string,
  templateDir?: string
): Promise<string> => {
  try {
    const outFile = path.join(outDir, `${name}.mdp`)
    const content = renderMdp(await readTemplate(name, templateDir), params)
    logger.info(`Write MDP File: ${outFile}`)
    await fs.writeFile(outFile, content)
    return outFile
  } catch (error) {
    logger.error(`Error in writeMdpFile: ${error}`)
    throw error
  }
}

export { buildMdpParams, renderMdp, writeMdpFile, EQUILIBRATION_STEPS }
