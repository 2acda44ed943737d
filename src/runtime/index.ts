export { TheoryDataResolver } from './TheoryDataResolver.js'
export { registerTheory, type TestRegistrar, type TheoryBody } from './register.js'
