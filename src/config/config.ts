import dotenv from 'dotenv'
import { fileURLToPath } from 'node:url'
dotenv.config()

const getEnvVar = (name: string, fallback: string): string => {
  const value = process.env[name]
  if (!value) {
    return fallback
  }
  return value
}

const getOptionalInt = (name: string): number | undefined => {
  const value = process.env[name]
  if (!value) return undefined
  const parsed = parseInt(value, 10)
  return Number.isFinite(parsed) && parsed > 0 ? parsed : undefined
}

export const config = {
  gmxBin: getEnvVar('GMX', 'gmx'),
  forceField: getEnvVar('GMX_FORCE_FIELD', 'amber99sb-ildn'),
  waterModel: getEnvVar('GMX_WATER_MODEL', 'tip3p'),
  // Index group fed to `gmx genion` on stdin (SOL for a protein in water)
  genionGroup: getEnvVar('GMX_GENION_GROUP', '13'),
  stepTimeoutMs: getOptionalInt('GMX_STEP_TIMEOUT_MS'),
  mdpTemplateDir: getEnvVar(
    'MDP_TEMPLATES',
    fileURLToPath(new URL('../templates/mdp', import.meta.url))
  ),
  logsDir: getEnvVar('GMX_MD_LOGS', './logs'),
  logLevel: getEnvVar('LOG_LEVEL', 'info'),
  logTimezone: process.env.LOG_TIMEZONE
}
