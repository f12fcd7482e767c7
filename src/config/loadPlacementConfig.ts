import { loadJson } from "./loadJson";
import { resolvePlacementConfig } from "./placementConfig";
import type { PlacementConfig } from "../types/config";

export async function loadPlacementConfig(path: string | URL): Promise<PlacementConfig> {
  const raw = await loadJson(path);
  return resolvePlacementConfig(raw);
}
