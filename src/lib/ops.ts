import { DevnetContext } from './context'
import { dockerRun } from './docker'
import { checkOutput } from './process'
import { ensureDir, path } from './utils/index'

export const artifactsDirEnvVar = 'COSMWASM_ARTIFACTS_DIR'
export const workspaceOptimizerImage = 'cosmwasm/workspace-optimizer:0.14.0'

/**
 * Build and optimize every contract crate of the CosmWasm workspace at `dir`. Artifacts land in
 * `$COSMWASM_ARTIFACTS_DIR`, `<dir>/artifacts` by default. Returns the artifacts directory.
 */
export async function optimizeWorkspace(ctx: DevnetContext, dir: string = ctx.cwd): Promise<string> {
  const workspace = path.resolve(ctx.cwd, dir)
  const artifacts = path.resolve(workspace, process.env[artifactsDirEnvVar] ?? 'artifacts')
  ensureDir(artifacts, true)

  const invocation = dockerRun({
    imageRepoTag: workspaceOptimizerImage,
    volumes: [[workspace, '/code']],
    mounts: [
      `type=volume,source=${path.basename(workspace)}_cache,target=/code/target`,
      'type=volume,source=registry_cache,target=/usr/local/cargo/registry'
    ],
    label: 'optimizer'
  })
  ctx.log.info(`optimizing contracts in ${workspace}`)
  checkOutput(invocation, await ctx.runner.run(invocation))
  return artifacts
}
