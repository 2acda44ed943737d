export { DataDiscovererRegistry, bindProvider, type CustomDataDiscoverer } from './DataDiscovererRegistry.js'
export { InlineDataDiscoverer } from './InlineDataDiscoverer.js'
export { MemberDataDiscoverer } from './MemberDataDiscoverer.js'
export { ClassDataDiscoverer } from './ClassDataDiscoverer.js'
export { FileDataDiscoverer } from './FileDataDiscoverer.js'
