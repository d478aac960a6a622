export * from './common'
export * from './system'
export * from './developers'
export * from './companies'
export * from './users'
export * from './campaigns'
export * from './characters'
export * from './dicerolls'
export * from './books'
export * from './character-traits'
