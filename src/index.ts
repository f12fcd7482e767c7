export type * from "./world/scatter/types";
export type * from "./types/config";

export { RoomScatterer, type RoomScattererOptions } from "./world/scatter/roomScatterer";
export { PlacementLedger } from "./world/scatter/ledger";
export { buildCategories } from "./world/scatter/categories";
export { makeRegion, regionArea, regionCenter } from "./world/scatter/region";
export {
  FALLBACK_FOOTPRINT_SIZE,
  fallbackFootprint,
  footprintFromMinMax,
  footprintMax,
  footprintMin,
  footprintOrFallback,
  footprintSize,
  horizontalRadius,
  inflateXZ,
  makeFootprint,
  overlapsXZ,
  translateFootprint,
  withinRegionXZ,
} from "./world/scatter/footprint";
export { RELAXATION_TIERS, effectiveClearance } from "./world/scatter/tiers";
export { DEFAULT_SETTINGS } from "./world/scatter/constants";
export { planCategory, theoreticalCapacity, capacityRadiusFor, type CategoryPlan } from "./world/scatter/generation/planner";
export { candidateInterval, generateCandidates, type Candidate, type CandidateInterval } from "./world/scatter/generation/candidates";
export {
  checkBoundary,
  checkExactOverlap,
  checkFloorContact,
  checkSeparation,
  validateEstimate,
  validateExact,
  type RejectReason,
  type Validation,
} from "./world/scatter/generation/validator";
export { PlacementExecutor, type PlacementStage, type AttemptOutcome } from "./world/scatter/generation/executor";

export { definePlacementConfig, resolvePlacementConfig } from "./config/placementConfig";
export { loadPlacementConfig } from "./config/loadPlacementConfig";

export { Logger, LogLevel, enableDebugLogging, disableLogging } from "./utils/logger";
export { makeRng, rngFrom, type RNG } from "./utils/seededRng";

export { pickFloorY, isFloorMesh, tagRoomMesh, roomMeshTag, type RoomMeshKind } from "./scene/floorPick";
export { MeshRoomRegionProvider } from "./scene/roomRegion";
export {
  BabylonSceneBinding,
  createRoomScatterer,
  findTemplate,
  resolveCategories,
  type ScatterTag,
  type SceneScatterer,
} from "./scene/sceneBinding";
