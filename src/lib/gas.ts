export type GasTier = 'low' | 'medium' | 'high'

export const defaultGasUnits = 100_000_000n

export class GasPrice {
  readonly amount: number | bigint
  readonly denom: string

  constructor(amount: number | bigint, denom: string) {
    this.amount = amount
    this.denom = denom
  }

  units(units: bigint | number): Gas {
    return { units: BigInt(units), price: this }
  }

  toString(): string {
    return `${this.amount}${this.denom}`
  }
}

export type Gas = {
  units: bigint
  price: GasPrice
}

export type GasPrices = Record<GasTier, GasPrice>

/** Gas price tiers in a single denom */
export function gasPrices(denom: string, low: number, medium: number, high: number): GasPrices {
  return {
    low: new GasPrice(low, denom),
    medium: new GasPrice(medium, denom),
    high: new GasPrice(high, denom)
  }
}

export type Coin = {
  amount: bigint | number
  denom: string
}

export function coin(amount: bigint | number, denom: string): Coin {
  return { amount, denom }
}

export function formatCoins(coins: readonly Coin[]): string {
  return coins.map((c) => `${c.amount}${c.denom}`).join(',')
}
