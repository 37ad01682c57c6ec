export { parseCargoManifest, readCargoMetadata } from './CargoManifest.js';
export { compareNames, discoverSourceFiles } from './FileDiscovery.js';
export { ProjectAnalyzer, assertProjectDirectory, sortBindingsByName } from './ProjectAnalyzer.js';
export { renderProjectTree } from './ProjectTree.js';
export type { AnalysisResults, DiscoveryResult, ProjectMetadata } from './types.js';
