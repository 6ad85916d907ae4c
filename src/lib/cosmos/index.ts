export * from './cmd'
export * from './poll'
export * from './tx_data'
