import * as utils from './utils/index'

export * as cosmos from './cosmos'
export * as schemas from './schemas'
export * from './errors'
export * from './config'
export { createContext, rootPath } from './context'
export type { ContextOptions, DevnetContext } from './context'
export * from './process'
export { Key, KeyringBackend, checkMnemonic, generateMnemonic } from './key'
export * from './gas'
export * from './contract'
export * from './lifecycle'
export * from './network/index'
export { optimizeWorkspace } from './ops'
export { utils }
