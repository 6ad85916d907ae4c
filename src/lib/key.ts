import { Bip39, EnglishMnemonic, Random } from '@cosmjs/crypto'
import { z } from 'zod'
import { MnemonicError } from './errors'

/** Where a key's secret material lives */
export enum KeyringBackend {
  Os = 'os',
  Test = 'test'
}

/** A key as printed by `<binary> keys ... --output json`; the backend is not part of the output */
export const rawKeySchema = z
  .object({
    name: z.string().min(1),
    address: z.string().min(1)
  })
  .passthrough()

export type RawKey = z.infer<typeof rawKeySchema>

export class Key {
  readonly name: string
  readonly address: string
  readonly backend: KeyringBackend

  constructor(name: string, address: string, backend: KeyringBackend) {
    this.name = name
    this.address = address
    this.backend = backend
    Object.freeze(this)
  }

  static fromRaw(raw: RawKey, backend: KeyringBackend): Key {
    return new Key(raw.name, raw.address, backend)
  }

  equals(other: Key): boolean {
    return this.name === other.name && this.address === other.address && this.backend === other.backend
  }

  toString(): string {
    return `${this.name} ${this.address} (${this.backend})`
  }
}

/** A fresh 24 word English mnemonic */
export function generateMnemonic(): string {
  return Bip39.encode(Random.getBytes(32)).toString()
}

/** Normalize and validate a mnemonic, including its checksum */
export function checkMnemonic(mnemonic: string): string {
  const normalized = mnemonic.trim().split(/\s+/).join(' ')
  try {
    return new EnglishMnemonic(normalized).toString()
  } catch (e) {
    throw new MnemonicError(`invalid mnemonic: ${e instanceof Error ? e.message : String(e)}`, e)
  }
}
