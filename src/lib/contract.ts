import { z } from 'zod'
import { CodeId, ContractAddress, ReadyTxCmd, TxCmd } from './cosmos/cmd'
import { PollOptions, txPollOptions, waitForTx } from './cosmos/poll'
import {
  decodeCodeId,
  decodeContractAddress,
  decodeExecuteResponse,
  decodeRecord,
  ExecuteResponse,
  ResponseDecoder
} from './cosmos/tx_data'
import { ParseError } from './errors'
import { Coin, defaultGasUnits } from './gas'
import { Key } from './key'
import { Network } from './network/network'
import { parseJson, smartQueryResponseSchema, TxRecord, validate } from './schemas'
import { getLogger } from './utils/logger'

const log = getLogger()

export type StoreRequest = { kind: 'store'; wasmPath: string }
export type InstantiateRequest = {
  kind: 'instantiate'
  codeId: CodeId
  label: string
  msg: unknown
}
export type ExecuteRequest = { kind: 'execute'; contract: ContractAddress; msg: unknown }
export type TxRequest = StoreRequest | InstantiateRequest | ExecuteRequest

/** Runs right before broadcast so a backend can add its own flags */
export type PreSubmitHook = (cmd: ReadyTxCmd) => ReadyTxCmd

export type TxNetwork = Pick<Network, 'name' | 'chainId' | 'nodeAddress' | 'gasPrice' | 'command' | 'pollConfig'>

export type Confirmed<R> = {
  record: TxRecord
  response: R
}

/** Contract messages as the chain CLI expects them. Big integers become decimal strings. */
export function serializeMsg(msg: unknown): string {
  try {
    return JSON.stringify(msg, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value))
  } catch (e) {
    throw new ParseError('message cannot be serialized to JSON', String(msg), e)
  }
}

/**
 * A contract transaction under construction. `R` is what the confirmed transaction's first message
 * response decodes to.
 */
export class Tx<R> {
  readonly request: TxRequest
  private readonly decode: ResponseDecoder<R>
  private gasUnits: bigint = defaultGasUnits
  private funds?: Coin
  private hook?: PreSubmitHook
  private pollOptions?: PollOptions
  protected adminAddress?: string

  constructor(request: TxRequest, decode: ResponseDecoder<R>) {
    this.request = request
    this.decode = decode
  }

  gas(units: bigint | number): this {
    this.gasUnits = BigInt(units)
    return this
  }

  /** Funds sent along with the message */
  amount(value: bigint | number, denom: string): this {
    this.funds = { amount: value, denom }
    return this
  }

  preSubmitHook(hook: PreSubmitHook): this {
    this.hook = hook
    return this
  }

  /** Bounds for waiting on confirmation; the network's poll configuration by default */
  poll(opts: PollOptions): this {
    this.pollOptions = opts
    return this
  }

  /** Sign with `signer`, broadcast, wait for inclusion and decode the response */
  async send(network: TxNetwork, signer: Key): Promise<R> {
    return (await this.sendWithRecord(network, signer)).response
  }

  async sendWithRecord(network: TxNetwork, signer: Key): Promise<Confirmed<R>> {
    const gas = network.gasPrice('medium').units(this.gasUnits)
    const chainId = network.chainId()
    const node = await network.nodeAddress()

    let cmd = this.build(network.command().tx(signer, chainId, node))
    if (this.funds) cmd = cmd.amount(this.funds.amount, this.funds.denom)
    if (this.hook) cmd = this.hook(cmd)

    const txId = await cmd.execute(gas)
    log.info(`${this.request.kind} tx: ${txId}`)

    const record = await waitForTx(network, txId, this.pollOptions ?? txPollOptions(network.pollConfig()))
    return { record, response: decodeRecord(record, this.decode) }
  }

  private build(tx: TxCmd): ReadyTxCmd {
    const request = this.request
    switch (request.kind) {
      case 'store':
        log.info(`storing contract bytecode: ${request.wasmPath}`)
        return tx.wasmStore(request.wasmPath)
      case 'instantiate': {
        const msg = serializeMsg(request.msg)
        log.info(`instantiating ${request.label} with code id ${request.codeId} with message: ${msg}`)
        return tx.wasmInstantiate(request.codeId, request.label, msg, this.adminAddress)
      }
      case 'execute': {
        const msg = serializeMsg(request.msg)
        log.info(`executing ${request.contract} with message: ${msg}`)
        return tx.wasmExecute(request.contract, msg)
      }
    }
  }
}

export class InstantiateTx extends Tx<ContractAddress> {
  admin(address: string): this {
    this.adminAddress = address
    return this
  }
}

/** Upload wasm bytecode; resolves to the new code id */
export function store(wasmPath: string): Tx<CodeId> {
  return new Tx({ kind: 'store', wasmPath }, decodeCodeId)
}

/** Instantiate stored code; resolves to the contract address. No admin unless `.admin()` is called. */
export function instantiate(codeId: CodeId, label: string, msg: unknown): InstantiateTx {
  return new InstantiateTx({ kind: 'instantiate', codeId, label, msg }, decodeContractAddress)
}

/** Execute a contract; resolves to the raw response, see ExecuteResponse.json */
export function execute(contract: ContractAddress, msg: unknown): Tx<ExecuteResponse> {
  return new Tx({ kind: 'execute', contract, msg }, decodeExecuteResponse)
}

/** Smart-query a contract and validate the `data` it returns */
export async function query<S extends z.ZodTypeAny>(
  network: Pick<Network, 'nodeAddress' | 'command'>,
  contract: ContractAddress,
  msg: unknown,
  schema: S
): Promise<z.output<S>> {
  const node = await network.nodeAddress()
  const json = serializeMsg(msg)
  log.info(`querying ${contract} with message: ${json}`)
  const out = await network.command().query(node).wasmSmart(contract, json)
  const { data } = parseJson(out, smartQueryResponseSchema, 'smart query')
  return validate(data, schema, 'smart query data', out)
}
