export * from "./schema.js";
export * from "./errors.js";
export { createLogger, setDebug, setQuiet } from "./log.js";
export type { Logger } from "./log.js";
export { ControllerClient } from "./controller.js";
export type { ControllerOptions } from "./controller.js";
export { buildNodes, parseDevice, parseDeviceRegistry, parseEntities, deviceRole, routeStaleness } from "./normalize.js";
export { collect, MIN_SUCCESS_FRACTION, DEFAULT_CONCURRENCY } from "./collector.js";
export type { MeshSource, MeshSession, SourceFactory, CollectOptions, CollectionResult } from "./collector.js";
export { matchEntities } from "./registry.js";
export type { MatchResult } from "./registry.js";
export { fuseTopology, ROUTE_STALENESS_LIMIT, SIBLING_LQI_FLOOR } from "./fusion.js";
export type { FusionAnnotations } from "./fusion.js";
export { PositionStore, DEFAULT_SPACE } from "./positions.js";
export { SnapshotCache } from "./snapshot-cache.js";
export type { CacheStatus, LastError } from "./snapshot-cache.js";
export { runPipeline } from "./pipeline.js";
export { saveExport, loadLatestExport, listExports, pruneExports, KEEP_EXPORTS } from "./archive.js";
export { summarize, formatSummary, WEAK_LQI } from "./summary.js";
export type { SummaryReport } from "./summary.js";
export { loadConfig, redactConfig } from "./config.js";
export type { MeshmapConfig, ConfigFlags } from "./config.js";
export { MeshmapServer } from "./server.js";
export type { ServerOptions } from "./server.js";
