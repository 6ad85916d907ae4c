import { z } from 'zod'
import { ParseError } from './errors'

export const attributeSchema = z.object({
  key: z.string(),
  value: z.string().nullish()
})

export const eventSchema = z.object({
  type: z.string(),
  attributes: z.array(attributeSchema).default([])
})

export const txLogSchema = z.object({
  events: z.array(eventSchema).default([])
})

/**
 * The JSON envelope printed by both `tx ... --output json` (broadcast) and `query tx`. Fields
 * that a broadcast response leaves out default to empty values.
 */
export const txRecordSchema = z.object({
  txhash: z.string().min(1),
  height: z.union([z.string(), z.number()]).nullish(),
  code: z.number().int().nonnegative().default(0),
  codespace: z.string().nullish(),
  raw_log: z.string().nullish().transform((v) => v ?? ''),
  logs: z
    .array(txLogSchema)
    .nullish()
    .transform((v) => v ?? []),
  data: z
    .string()
    .nullish()
    .transform((v) => v ?? '')
})

export type TxRecord = z.infer<typeof txRecordSchema>
export type TxAttribute = z.infer<typeof attributeSchema>

const syncInfoSchema = z.object({
  latest_block_height: z.coerce.number().int().nonnegative()
})

/** `status` output; older nodes print `SyncInfo`, newer ones `sync_info` */
export const statusSchema = z
  .object({
    SyncInfo: syncInfoSchema.optional(),
    sync_info: syncInfoSchema.optional()
  })
  .transform((s, ctx) => {
    const info = s.SyncInfo ?? s.sync_info
    if (!info) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'status has no sync info' })
      return z.NEVER
    }
    return { latestBlockHeight: info.latest_block_height }
  })

export type NodeStatus = z.infer<typeof statusSchema>

export const codeInfoSchema = z.object({
  creator: z.string(),
  data_hash: z.string()
})

export type CodeInfo = z.infer<typeof codeInfoSchema>

export const smartQueryResponseSchema = z.object({
  data: z.unknown()
})

/** Validate an already parsed value, raising a ParseError that keeps the original text */
export function validate<S extends z.ZodTypeAny>(value: unknown, schema: S, what: string, text: string): z.output<S> {
  const parsed = schema.safeParse(value)
  if (!parsed.success) {
    throw new ParseError(`${what}: unexpected output: ${parsed.error.issues.map((i) => i.message).join(', ')}`, text)
  }
  return parsed.data
}

/** Parse command output as JSON and validate it, raising a ParseError on either failure */
export function parseJson<S extends z.ZodTypeAny>(text: string, schema: S, what: string): z.output<S> {
  let json: unknown
  try {
    json = JSON.parse(text)
  } catch (e) {
    throw new ParseError(`${what}: output is not valid JSON`, text, e)
  }
  return validate(json, schema, what, text)
}
