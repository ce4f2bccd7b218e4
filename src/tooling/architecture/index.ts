/**
 * @module layered-app-kit/tooling/architecture
 * @description Directory contract and dependency-direction checks
 */

export { ArchitectureChecker } from './ArchitectureChecker';
export type { ArchitectureCheckerOptions, ArchitectureReport, Violation } from './ArchitectureChecker';

export { formatReport } from './formatReport';

export { scanImports, resolveImport } from './ImportScanner';
export type { ImportReference } from './ImportScanner';

export { locate, segmentsUnder, isLayer, LAYERS } from './ProjectLayout';
export type { Layer, Location } from './ProjectLayout';

export { checkRepositoryContracts } from './RepositoryContract';
export type { ContractProblem } from './RepositoryContract';
