import { z } from 'zod'

/** Verbosity for the structured tree logger. */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent'

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent']

/** Tunables for a dynamic bounding volume hierarchy. */
export interface TreeSettings {
  /** Arena slot hint, rounded up to a power of two. */
  initialCapacity: number
  /** Axis count every stored or queried volume must have. */
  dimensions: number
  /** Sibling subtree-size gap above which insertion ignores cost and descends into the smaller side. */
  balanceThreshold: number
  /** Relative gap under which two child costs count as tied. */
  costTolerance: number
  /** Run the full invariant scan after every mutation. Slow; meant for tests and debugging. */
  validateOnMutation: boolean
  logLevel: LogLevel
}

export type TreeSettingKey = keyof TreeSettings

export const DEFAULT_SETTINGS: TreeSettings = {
  initialCapacity: 16,
  dimensions: 3,
  balanceThreshold: 2,
  costTolerance: 1e-3,
  validateOnMutation: false,
  logLevel: 'warn',
}

/** Environment variable consulted for each setting. */
export const SETTING_ENV_KEYS: Record<TreeSettingKey, string> = {
  initialCapacity: 'BVH_INITIAL_CAPACITY',
  dimensions: 'BVH_DIMENSIONS',
  balanceThreshold: 'BVH_BALANCE_THRESHOLD',
  costTolerance: 'BVH_COST_TOLERANCE',
  validateOnMutation: 'BVH_VALIDATE',
  logLevel: 'BVH_LOG_LEVEL',
}

export const treeSettingsSchema = z.object({
  initialCapacity: z.number().int().min(1).max(2 ** 30),
  dimensions: z.number().int().min(1).max(16),
  balanceThreshold: z.number().int().min(0),
  costTolerance: z.number().min(0).max(1),
  validateOnMutation: z.boolean(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']),
})

/** Raised when merged settings fail validation. */
export class InvalidSettingsError extends Error {
  constructor(public readonly fields: Partial<Record<string, string[]>>) {
    super(
      `Invalid tree settings: ${Object.entries(fields)
        .map(([key, messages]) => `${key} (${(messages ?? []).join('; ')})`)
        .join(', ')}`,
    )
    this.name = 'InvalidSettingsError'
  }
}

type Env = Record<string, string | undefined>

function readEnvString(env: Env, key: string): string | undefined {
  const val = env[key]
  if (val === undefined || val.trim() === '') return undefined
  return val.trim()
}

function readEnvNumber(env: Env, key: string): number | undefined {
  const val = readEnvString(env, key)
  // NaN is left for the schema to reject
  return val === undefined ? undefined : Number(val)
}

function readEnvFlag(env: Env, key: string): boolean | undefined {
  const val = readEnvString(env, key)
  if (val === 'true' || val === '1') return true
  if (val === 'false' || val === '0') return false
  return undefined
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value)
}

/** Settings taken from the environment only; unset variables are omitted. */
export function readEnvSettings(env: Env = process.env): Partial<TreeSettings> {
  const out: Partial<TreeSettings> = {}
  const initialCapacity = readEnvNumber(env, SETTING_ENV_KEYS.initialCapacity)
  if (initialCapacity !== undefined) out.initialCapacity = initialCapacity
  const dimensions = readEnvNumber(env, SETTING_ENV_KEYS.dimensions)
  if (dimensions !== undefined) out.dimensions = dimensions
  const balanceThreshold = readEnvNumber(env, SETTING_ENV_KEYS.balanceThreshold)
  if (balanceThreshold !== undefined) out.balanceThreshold = balanceThreshold
  const costTolerance = readEnvNumber(env, SETTING_ENV_KEYS.costTolerance)
  if (costTolerance !== undefined) out.costTolerance = costTolerance
  const validateOnMutation = readEnvFlag(env, SETTING_ENV_KEYS.validateOnMutation)
  if (validateOnMutation !== undefined) out.validateOnMutation = validateOnMutation
  const logLevel = readEnvString(env, SETTING_ENV_KEYS.logLevel)
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new InvalidSettingsError({ logLevel: [`Unknown log level "${logLevel}"`] })
    }
    out.logLevel = logLevel
  }
  return out
}

/** Resolve settings: explicit overrides > environment > defaults. */
export function resolveSettings(
  overrides: Partial<TreeSettings> = {},
  env: Env = process.env,
): TreeSettings {
  const merged = { ...DEFAULT_SETTINGS, ...readEnvSettings(env), ...dropUndefined(overrides) }
  const result = treeSettingsSchema.safeParse(merged)
  if (!result.success) {
    throw new InvalidSettingsError(result.error.flatten().fieldErrors)
  }
  return result.data
}

function dropUndefined(overrides: Partial<TreeSettings>): Partial<TreeSettings> {
  const out: Partial<TreeSettings> = {}
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(out, { [key]: value })
  }
  return out
}
