import { Scene, Ray, Vector3, AbstractMesh } from "@babylonjs/core";

export type RoomMeshKind = "floor" | "wall" | "ceiling";

export interface RoomMeshTag {
  kind: RoomMeshKind;
  room: string;
}

const ROOM_MESH_KINDS: readonly RoomMeshKind[] = ["floor", "wall", "ceiling"];

function isRoomMeshKind(v: unknown): v is RoomMeshKind {
  return ROOM_MESH_KINDS.some((k) => k === v);
}

function readRoomTag(metadata: unknown): RoomMeshTag | null {
  if (typeof metadata !== "object" || metadata === null || !("room" in metadata)) return null;
  const tag: unknown = metadata.room;
  if (typeof tag !== "object" || tag === null || !("kind" in tag) || !("room" in tag)) return null;
  const { kind, room } = tag;
  if (!isRoomMeshKind(kind) || typeof room !== "string") return null;
  return { kind, room };
}

/** Tags a room surface so region discovery and floor picking can find it. */
export function tagRoomMesh(mesh: AbstractMesh, kind: RoomMeshKind, room: string) {
  const prev: unknown = mesh.metadata;
  const base = typeof prev === "object" && prev !== null ? prev : {};
  mesh.metadata = { ...base, room: { kind, room } satisfies RoomMeshTag };
}

export function roomMeshTag(m: AbstractMesh): RoomMeshTag | null {
  return readRoomTag(m.metadata);
}

export function isFloorMesh(m: AbstractMesh): boolean {
  return roomMeshTag(m)?.kind === "floor";
}

/** Picking reads cached world matrices, so floors moved since the last render are refreshed first. */
export function pickFloorY(scene: Scene, x: number, z: number, originY: number, maxDist: number): number | null {
  for (const m of scene.meshes) if (isFloorMesh(m)) m.computeWorldMatrix(true);
  const ray = new Ray(new Vector3(x, originY, z), new Vector3(0, -1, 0), maxDist);
  const hit = scene.pickWithRay(ray, isFloorMesh);
  if (!hit?.hit || !hit.pickedPoint) return null;
  return hit.pickedPoint.y;
}
