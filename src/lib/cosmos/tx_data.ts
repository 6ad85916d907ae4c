import { fromHex, fromUtf8 } from '@cosmjs/encoding'
import { TxMsgData } from 'cosmjs-types/cosmos/base/abci/v1beta1/abci'
import {
  MsgExecuteContractResponse,
  MsgInstantiateContractResponse,
  MsgStoreCodeResponse
} from 'cosmjs-types/cosmwasm/wasm/v1/tx'
import { z } from 'zod'
import { DecodeError, ExpectedAtLeastOneMsgResponseError, ParseError } from '../errors'
import { TxAttribute, TxRecord, validate } from '../schemas'
import { CodeId, ContractAddress } from './cmd'

/** Turns the payload of the first message response into a typed value */
export type ResponseDecoder<R> = (payload: Uint8Array) => R

/** Bytes returned by a contract's execute entry point */
export class ExecuteResponse {
  readonly bytes: Uint8Array

  constructor(bytes: Uint8Array) {
    this.bytes = bytes
  }

  get isEmpty(): boolean {
    return this.bytes.length === 0
  }

  text(): string {
    return fromUtf8(this.bytes)
  }

  /** Decode the response as JSON validated by `schema` */
  json<S extends z.ZodTypeAny>(schema: S): z.output<S> {
    const text = this.text()
    let value: unknown
    try {
      value = JSON.parse(text)
    } catch (e) {
      throw new ParseError('execute response is not valid JSON', text, e)
    }
    return validate(value, schema, 'execute response', text)
  }
}

function decoding<R>(what: string, decode: ResponseDecoder<R>): ResponseDecoder<R> {
  return (payload) => {
    try {
      return decode(payload)
    } catch (e) {
      throw new DecodeError(`could not decode ${what}: ${e instanceof Error ? e.message : String(e)}`, e)
    }
  }
}

export const decodeCodeId: ResponseDecoder<CodeId> = decoding(
  'MsgStoreCodeResponse',
  (payload) => MsgStoreCodeResponse.decode(payload).codeId
)

export const decodeContractAddress: ResponseDecoder<ContractAddress> = decoding(
  'MsgInstantiateContractResponse',
  (payload) => MsgInstantiateContractResponse.decode(payload).address
)

export const decodeExecuteResponse: ResponseDecoder<ExecuteResponse> = decoding(
  'MsgExecuteContractResponse',
  (payload) => new ExecuteResponse(MsgExecuteContractResponse.decode(payload).data)
)

/**
 * The payload of the first message response of a confirmed transaction. `data` is the hex encoded
 * TxMsgData; chains on cosmos-sdk >= 0.46 fill `msg_responses`, older ones the legacy `data` list.
 */
export function firstMsgResponse(record: TxRecord): Uint8Array {
  let bytes: Uint8Array
  try {
    bytes = fromHex(record.data)
  } catch (e) {
    throw new DecodeError(`transaction ${record.txhash} data is not valid hex`, e)
  }
  let msgData: TxMsgData
  try {
    msgData = TxMsgData.decode(bytes)
  } catch (e) {
    throw new DecodeError(`transaction ${record.txhash} data is not a TxMsgData`, e)
  }
  const [response] = msgData.msgResponses
  if (response) return response.value
  const [legacy] = msgData.data
  if (legacy) return legacy.data
  throw new ExpectedAtLeastOneMsgResponseError()
}

export function decodeRecord<R>(record: TxRecord, decode: ResponseDecoder<R>): R {
  return decode(firstMsgResponse(record))
}

/** All event attributes of a transaction, in log order */
export function attributes(record: TxRecord): TxAttribute[] {
  return record.logs.flatMap((l) => l.events).flatMap((e) => e.attributes)
}
