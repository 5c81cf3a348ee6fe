export { summarizeRoutes, type RouteStatistics } from "./normalize";
export {
  RouteManifestSchema,
  createManifest,
  readManifest,
  writeManifest,
  type RouteManifest,
  type WriteOptions,
} from "./writer";
export { formatRouteTable } from "./summary";
export {
  diffManifests,
  type ChangedRoute,
  type ManifestDiff,
  type RouteSummary,
} from "./diff";
