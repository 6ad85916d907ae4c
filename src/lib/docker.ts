import { z } from 'zod'
import { checkOutput, CommandRunner, Invocation } from './process'
import { ParseError } from './errors'

const stringPair = z.array(z.string()).length(2)

const containerSchema = z.object({
  imageRepoTag: z.string().min(1),
  args: z.array(z.string()).default([]),
  name: z.string().nullish(),
  /** Published ports. Array of length-2 arrays, [[hostPort, containerPort]*] */
  ports: z.array(stringPair).default([]),
  /** Attached container volumes. Array of length-2 arrays, [[hostPath, containerPath]*] */
  volumes: z.array(stringPair).default([]),
  /** `--mount` specs, e.g. type=volume,source=cache,target=/code/target */
  mounts: z.array(z.string()).default([]),
  env: z.record(z.string()).default({}),
  detach: z.boolean().default(false),
  interactive: z.boolean().default(false),
  remove: z.boolean().default(true),
  workDir: z.string().nullish(),
  entrypoint: z.string().nullish(),
  label: z.string().default('main')
})

export type ContainerConfig = z.input<typeof containerSchema>

export const runnerLabel = 'org.cosmwasm-devnet.runner=cosmwasm-devnet'

/** The `docker container run` invocation for a container config */
export function dockerRun(config: ContainerConfig): Invocation {
  const parsed = containerSchema.parse(config)
  const args = ['container', 'run']

  if (parsed.remove) {
    args.push('--rm')
  }
  if (parsed.detach) {
    args.push('--detach')
  }
  if (parsed.interactive) {
    args.push('--interactive')
  }
  if (parsed.name) {
    args.push('--name', parsed.name)
  }
  for (const [hostPath, containerPath] of parsed.volumes) {
    args.push('--volume', `${hostPath}:${containerPath}`)
  }
  for (const mount of parsed.mounts) {
    args.push('--mount', mount)
  }
  if (parsed.workDir) {
    args.push('--workdir', parsed.workDir)
  }
  for (const [hostPort, containerPort] of parsed.ports) {
    args.push('--publish', `${hostPort}:${containerPort}`)
  }
  for (const [key, value] of Object.entries(parsed.env)) {
    args.push('--env', `${key}=${value}`)
  }
  if (parsed.entrypoint) {
    args.push('--entrypoint', parsed.entrypoint)
  }
  args.push('--label', 'org.cosmwasm-devnet.label=' + parsed.label)
  args.push('--label', runnerLabel)
  args.push(parsed.imageRepoTag)
  args.push(...parsed.args)

  return { program: 'docker', args }
}

export async function pullImage(runner: CommandRunner, imageRepoTag: string): Promise<void> {
  const invocation: Invocation = { program: 'docker', args: ['pull', imageRepoTag] }
  checkOutput(invocation, await runner.run(invocation))
}

/**
 * Get the container ip within docker network.
 * @returns IP address within docker network which can be used from the host or another container
 */
export async function getIPAddress(runner: CommandRunner, container: string): Promise<string> {
  const invocation: Invocation = {
    program: 'docker',
    args: ['inspect', '-f', '{{range .NetworkSettings.Networks}}{{.IPAddress}}{{end}}', container]
  }
  const out = checkOutput(invocation, await runner.run(invocation))
  // some docker versions keep the quotes of a quoted format string
  const ip = out.stdout.trim().replace(/^'(.*)'$/, '$1')
  if (ip.length < 7) {
    throw new ParseError(`cannot get IP address of container ${container}`, out.stdout)
  }
  return ip
}

export class DockerImage {
  readonly repo: string
  readonly tag: string

  constructor(repo: string, tag: string) {
    this.repo = repo
    this.tag = tag
  }

  full(): string {
    return this.repo + ':' + this.tag
  }
}
