import { AbstractMesh, Quaternion, Scene, TransformNode, Vector3 } from "@babylonjs/core";

import type { PlacementConfig } from "../types/config";
import type { RNG } from "../utils/seededRng";
import { buildCategories } from "../world/scatter/categories";
import { footprintOrFallback } from "../world/scatter/footprint";
import { RoomScatterer } from "../world/scatter/roomScatterer";
import type {
  Category,
  Footprint,
  GeometryProvider,
  InstantiationService,
  PlacedItem,
  RelaxationTier,
  Vec3,
} from "../world/scatter/types";

export interface ScatterTag {
  categoryId: string;
  itemId: string;
  tier: RelaxationTier;
}

export interface SceneBindingOptions {
  /** Show bounding boxes on committed instances. */
  debugBounds?: boolean;
}

function toVec3(v: Vector3): Vec3 {
  return { x: v.x, y: v.y, z: v.z };
}

function meshesOf(node: TransformNode): AbstractMesh[] {
  const out = node.getChildMeshes(false);
  if (node instanceof AbstractMesh) out.unshift(node);
  return out;
}

/**
 * Geometry and instantiation against a Babylon scene. Templates are nodes
 * (usually disabled) that get cloned; instances are world-space clones.
 */
export class BabylonSceneBinding
  implements GeometryProvider<TransformNode, TransformNode>, InstantiationService<TransformNode, TransformNode, TransformNode>
{
  private counter = 0;

  constructor(private readonly opts: SceneBindingOptions = {}) {}

  estimateFootprint(template: TransformNode): Footprint {
    template.computeWorldMatrix(true);
    const { min, max } = template.getHierarchyBoundingVectors(true);
    const pivot = template.getAbsolutePosition();
    return footprintOrFallback(
      { x: min.x - pivot.x, y: min.y - pivot.y, z: min.z - pivot.z },
      { x: max.x - pivot.x, y: max.y - pivot.y, z: max.z - pivot.z },
      { x: 0, y: 0, z: 0 }
    );
  }

  measureExactFootprint(handle: TransformNode): Footprint {
    handle.computeWorldMatrix(true);
    const { min, max } = handle.getHierarchyBoundingVectors(true);
    return footprintOrFallback(toVec3(min), toVec3(max), toVec3(handle.getAbsolutePosition()));
  }

  create(template: TransformNode, position: Vec3, orientation: number, parent: TransformNode | null): TransformNode {
    const node = template.clone(`${template.name}_scatter_${++this.counter}`, parent, false);
    if (!node) throw new Error(`Failed to clone template "${template.name}"`);

    node.setEnabled(true);
    for (const m of node.getChildMeshes(false)) m.setEnabled(true);

    if (orientation !== 0) {
      if (node.rotationQuaternion) {
        node.rotationQuaternion = Quaternion.RotationYawPitchRoll(orientation, 0, 0).multiply(node.rotationQuaternion);
      } else {
        node.rotation.y += orientation;
      }
    }

    this.setPosition(node, position);
    return node;
  }

  destroy(handle: TransformNode): void {
    handle.dispose(false, false);
  }

  getPosition(handle: TransformNode): Vec3 {
    handle.computeWorldMatrix(true);
    return toVec3(handle.getAbsolutePosition());
  }

  setPosition(handle: TransformNode, position: Vec3): void {
    handle.setAbsolutePosition(new Vector3(position.x, position.y, position.z));
    handle.computeWorldMatrix(true);
  }

  onCommitted(handle: TransformNode, item: PlacedItem<TransformNode>): void {
    const prev: unknown = handle.metadata;
    const base = typeof prev === "object" && prev !== null ? prev : {};
    const scatter: ScatterTag = { categoryId: item.categoryId, itemId: item.itemId, tier: item.tier };
    handle.metadata = { ...base, scatter };

    if (this.opts.debugBounds) {
      for (const m of meshesOf(handle)) m.showBoundingBox = true;
    }
  }
}

/** Looks a template up by name, transform nodes first, then meshes. */
export function findTemplate(scene: Scene, name: string): TransformNode | null {
  return scene.getTransformNodeByName(name) ?? scene.getMeshByName(name);
}

export function resolveCategories(scene: Scene, config: Pick<PlacementConfig, "categories">): Category<TransformNode>[] {
  return buildCategories(config.categories, (name) => findTemplate(scene, name));
}

export interface SceneScatterer {
  scatterer: RoomScatterer<TransformNode, TransformNode, TransformNode>;
  binding: BabylonSceneBinding;
  root: TransformNode;
}

/** Wires a scatterer to a scene: templates resolved by name, instances parented under `scatter_root`. */
export function createRoomScatterer(scene: Scene, config: PlacementConfig, rng?: RNG): SceneScatterer {
  const root = new TransformNode("scatter_root", scene);
  const binding = new BabylonSceneBinding({ debugBounds: config.debugBounds });
  const scatterer = new RoomScatterer<TransformNode, TransformNode, TransformNode>({
    settings: config,
    categories: resolveCategories(scene, config),
    geometry: binding,
    instances: binding,
    parent: root,
    rng,
  });
  return { scatterer, binding, root };
}
