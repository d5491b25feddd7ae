export { AlertEngine, AlertEngineOptions, AlertEngineEvents } from './services/alertEngine';
export { ZoneIndex, ZoneLoadResult, highestSeverity, severityRank } from './services/zoneIndex';
export {
  ProximityTracker,
  ProximityTrackerOptions,
  POIIngestResult,
  mergeNearby,
  mergePoints
} from './services/proximityTracker';
export { GeofenceStateMachine, GeofenceStateMachineOptions } from './services/geofenceStateMachine';
export { assessSafety, riskLevelFor, zoneHeatPoints } from './services/heatLayer';
export { DEFAULT_ENGINE_CONFIG, resolveEngineConfig } from './config/engineConfig';
export {
  EngineError,
  EngineErrorCode,
  InvalidZoneError,
  MalformedPOIError,
  ConfigurationError,
  DiagnosticsCallback
} from './utils/errors';
export {
  EARTH_RADIUS_KM,
  haversineKm,
  isPointInPolygon,
  vertexCentroid,
  circlePolygon
} from './utils/geo';
export {
  parseZone,
  parseZones,
  parsePOI,
  parsePOIs,
  parseZoneType,
  parseHeatPointType,
  ParsedZones,
  ParsedPOIs
} from './utils/payloadParser';
