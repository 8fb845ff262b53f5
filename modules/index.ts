export {
  factorize,
  isPrime,
  isSmooth,
  resolveFactorSet,
  type AllowedFactorsInput,
  type FactorSet,
} from "./smooth/smoothness";
export {
  BOUNDARY_MESSAGE,
  nearestSmooth,
  nearestSmoothValue,
  searchNearest,
  toDirection,
  type BoundaryDiagnostic,
  type SearchDirection,
  type SearchResult,
} from "./smooth/nearest-search";
export {
  closestOptimal,
  closestOptimalAll,
  reportDiagnostic,
  type BatchResult,
  type ClosestOptimalOptions,
} from "./smooth/closest-optimal";
export {
  buildTable,
  deriveCeiling,
  exponentsForCeiling,
  toExponentEntries,
  type MaxExponentsInput,
  type SmoothTable,
} from "./table/table-builder";
export { bisectLeft, bisectRight, lookup, lookupLarger, lookupSmaller } from "./table/table-lookup";
export {
  createTableArtifact,
  loadTableArtifact,
  parseTableArtifact,
  serializeTableArtifact,
  writeTableArtifact,
  type TableArtifactOptions,
} from "./table/table-artifact";
export {
  ResolverRegistry,
  createFactorizationResolver,
  createTableResolver,
  smoothResolvers,
  type SmoothResolver,
  type TableResolverOptions,
  type TableSource,
} from "./core/resolver-registry";
export {
  InvalidArgumentError,
  OutOfRangeError,
  ResolverNotFoundError,
  SmoothDimsError,
} from "@shared/smooth-errors";
export { DEFAULT_ALLOWED_FACTORS, DEFAULT_TABLE_EXPONENTS } from "@shared/smooth-const";
