import { archwayLocal } from './archway'
import { NetworkBackend, NetworkName, networkNames } from './network'
import { neutronLocal } from './neutron/local'
import { neutronTestnet } from './neutron/testnet'

export * from './network'
export { ArchwayLocal, archwayLocal } from './archway'
export { NeutronLocal, neutronLocal } from './neutron/local'
export type { NeutronLocalOptions } from './neutron/local'
export { NeutronTestnet, neutronTestnet } from './neutron/testnet'

export const backends: Readonly<Record<NetworkName, NetworkBackend>> = {
  'archway-local': archwayLocal,
  'neutron-local': neutronLocal,
  'neutron-testnet': neutronTestnet
}

export function isNetworkName(name: string): name is NetworkName {
  return networkNames.some((n) => n === name)
}

export function getBackend(name: NetworkName): NetworkBackend {
  return backends[name]
}
