import { AbstractMesh, Observable, Scene, Vector3 } from "@babylonjs/core";

import { Logger, errorMessage } from "../utils/logger";
import { makeRegion } from "../world/scatter/region";
import type { Region, RegionProvider } from "../world/scatter/types";
import { pickFloorY } from "./floorPick";

// Ray start above the room's top, and extra reach below its bottom (meters).
const PICK_HEADROOM = 1;

/**
 * Region provider backed by the room's surface meshes (walls, floor,
 * ceiling). Each `setRoomMeshes`/`refresh` is one discovery cycle: the
 * union bounds become the Region and `onRegionReadyObservable` fires once.
 */
export class MeshRoomRegionProvider implements RegionProvider {
  readonly onRegionReadyObservable = new Observable<Region>();

  private meshes: AbstractMesh[] = [];
  private region: Region | null = null;

  constructor(private readonly scene: Scene) {}

  getRegionBounds(): Region | null {
    return this.region;
  }

  setRoomMeshes(meshes: readonly AbstractMesh[]): Region | null {
    this.meshes = meshes.filter((m) => !m.isDisposed());
    return this.refresh();
  }

  /** Recomputes the region from the current meshes and notifies observers on success. */
  refresh(): Region | null {
    this.meshes = this.meshes.filter((m) => !m.isDisposed());
    if (this.meshes.length === 0) {
      Logger.warn("room region: no room meshes");
      this.region = null;
      return null;
    }

    const min = new Vector3(Number.POSITIVE_INFINITY, Number.POSITIVE_INFINITY, Number.POSITIVE_INFINITY);
    const max = new Vector3(Number.NEGATIVE_INFINITY, Number.NEGATIVE_INFINITY, Number.NEGATIVE_INFINITY);
    for (const mesh of this.meshes) {
      mesh.computeWorldMatrix(true);
      const box = mesh.getBoundingInfo().boundingBox;
      min.minimizeInPlace(box.minimumWorld);
      max.maximizeInPlace(box.maximumWorld);
    }

    // Prefer the tagged floor surface under the room center; fall back to the lowest extent.
    const cx = (min.x + max.x) * 0.5;
    const cz = (min.z + max.z) * 0.5;
    const picked = pickFloorY(this.scene, cx, cz, max.y + PICK_HEADROOM, max.y - min.y + 2 * PICK_HEADROOM);
    const floorY = picked === null ? min.y : Math.min(max.y, Math.max(min.y, picked));

    try {
      this.region = makeRegion(min, max, floorY);
    } catch (err) {
      Logger.warn(`room region: ${errorMessage(err)}`);
      this.region = null;
      return null;
    }

    Logger.debug(`room region: ${this.meshes.length} surface(s), floorY=${floorY}`);
    this.onRegionReadyObservable.notifyObservers(this.region);
    return this.region;
  }

  dispose() {
    this.onRegionReadyObservable.clear();
    this.meshes = [];
    this.region = null;
  }
}
