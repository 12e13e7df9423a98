export * from './constants.js'
export * from './math/util.js'
export * from './math/fraction.js'
export * from './types/chart.js'
export * from './types/TimingData.js'
