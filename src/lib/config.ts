import { z } from 'zod'
import { levels, loggerSchema } from './utils/logger'
import { fs, path, readYamlFile } from './utils/index'

export const rootEnvVar = 'COSMWASM_DEVNET_ROOT'
export const logLevelEnvVar = 'COSMWASM_DEVNET_LOG_LEVEL'
export const archwayTagEnvVar = 'ARCHWAYD_DOCKER_IMAGE_TAG'

export const configFileName = 'config.yaml'

export const archwayConfigSchema = z
  .object({
    Image: z.string().min(1).default('ghcr.io/archway-network/archwayd'),
    DebugImage: z.string().min(1).default('ghcr.io/archway-network/archwayd-debug'),
    Tag: z.string().min(1).default('v1.0.0'),
    Container: z.string().min(1).default('cosmwasm_devnet_archwayd')
  })
  .default({})

export const pollConfigSchema = z
  .object({
    TxIntervalMs: z.number().int().nonnegative().default(250),
    BlockIntervalMs: z.number().int().nonnegative().default(500),
    MaxAttempts: z.number().int().positive().optional(),
    TimeoutMs: z.number().int().positive().optional()
  })
  .default({})

export const devnetConfigSchema = z.object({
  Logger: loggerSchema,
  Archway: archwayConfigSchema,
  Poll: pollConfigSchema
})

export type DevnetConfig = z.infer<typeof devnetConfigSchema>
export type ArchwayConfig = z.infer<typeof archwayConfigSchema>
export type PollConfig = z.infer<typeof pollConfigSchema>

export function defaultConfig(): DevnetConfig {
  return devnetConfigSchema.parse({})
}

/**
 * Load the configuration. An explicit file must exist; otherwise `<root>/config.yaml` is read when
 * present. Environment variables win over the file.
 */
export function loadConfig(root: string, file?: string): DevnetConfig {
  const candidate = file ?? path.join(root, configFileName)
  if (file && !fs.existsSync(file)) throw new Error(`could not read config file: ${file}`)
  const raw = fs.existsSync(candidate) ? readYamlFile(candidate) ?? {} : {}
  const config = devnetConfigSchema.parse(raw)

  const level = process.env[logLevelEnvVar]
  if (level) config.Logger.Level = z.enum(levels).parse(level)
  const tag = process.env[archwayTagEnvVar]
  if (tag) config.Archway.Tag = tag
  return config
}

/** `$COSMWASM_DEVNET_ROOT`, or `target/cosmwasm-devnet` under the working directory */
export function defaultRoot(cwd: string = process.cwd()): string {
  const fromEnv = process.env[rootEnvVar]
  return fromEnv ? path.resolve(cwd, fromEnv) : path.join(cwd, 'target', 'cosmwasm-devnet')
}
