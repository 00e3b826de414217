type TimeUnit = 'ns' | 'ps' | 'us' | 'ms'

type SimulationTime = {
  raw: string
  value: number
  unit: TimeUnit
  nanoseconds: number
  totalSteps: number
}

type MdRunParams = {
  input_pdb: string
  out_dir: string
  basename: string
  force_field: string
  water_model: string
  sim_time: SimulationTime
  gmx_bin: string
  genion_group: string
  timeout_ms?: number
}

type MdpName = 'ions' | 'em' | 'nvt' | 'npt' | 'md'

type MdpParams = {
  nsteps: number
  emtol?: string
  emstep?: number
  dt?: number
  nstout?: number
  ref_t?: number
}

type StepStatus = 'Success' | 'Error'

type StepResult = {
  step: number
  name: string
  command: string
  code: number | null
  signal: NodeJS.Signals | null
  duration_ms: number
}

type MdRunManifest = {
  status: StepStatus
  started: string
  finished: string
  input_pdb: string
  out_dir: string
  force_field: string
  water_model: string
  sim_time: string
  sim_time_ns: number
  total_steps: number
  steps: StepResult[]
  error?: string
}

export type {
  TimeUnit,
  SimulationTime,
  MdRunParams,
  MdpName,
  MdpParams,
  StepStatus,
  StepResult,
  MdRunManifest
}
