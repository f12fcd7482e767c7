/**
 * In-process stand-ins for the geometry and instantiation collaborators.
 * Templates are boxes described by size and pivot offset; instances are
 * plain records, and every create/destroy/commit is appended to `events`.
 */
import { Observable } from "@babylonjs/core";
import { makeRegion } from "../../../src/world/scatter/region";
import type {
  Category,
  Footprint,
  GeometryProvider,
  InstantiationService,
  PlacedItem,
  Region,
  RegionProvider,
  Vec3,
} from "../../../src/world/scatter/types";

export interface BoxTemplate {
  name: string;
  size: Vec3;
  /** Box center relative to the pivot. */
  pivotOffset: Vec3;
  /** Added to `size` on instances only: the estimate underreports by this much. */
  drift: Vec3;
  failCreate: boolean;
  failEstimate: boolean;
}

export function boxTemplate(name: string, overrides: Partial<Omit<BoxTemplate, "name">> = {}): BoxTemplate {
  return {
    name,
    size: { x: 1, y: 1, z: 1 },
    pivotOffset: { x: 0, y: 0, z: 0 },
    drift: { x: 0, y: 0, z: 0 },
    failCreate: false,
    failEstimate: false,
    ...overrides,
  };
}

export interface FakeInstance {
  id: number;
  template: BoxTemplate;
  position: Vec3;
  orientation: number;
  destroyed: boolean;
  committed: PlacedItem<FakeInstance> | null;
}

export class FakeScene
  implements GeometryProvider<BoxTemplate, FakeInstance>, InstantiationService<BoxTemplate, FakeInstance, string> {
  readonly instances: FakeInstance[] = [];
  readonly events: string[] = [];
  readonly parents: (string | null)[] = [];

  /** Called after an instance is created, before it is returned. */
  onCreate: ((inst: FakeInstance) => void) | null = null;
  /** Called from the commit hook. */
  onCommit: ((inst: FakeInstance, item: PlacedItem<FakeInstance>) => void) | null = null;

  private serial = 0;

  get live(): FakeInstance[] {
    return this.instances.filter(i => !i.destroyed);
  }

  estimateFootprint(template: BoxTemplate): Footprint {
    if (template.failEstimate) throw new Error(`no geometry for ${template.name}`);
    return {
      center: { ...template.pivotOffset },
      extents: { x: template.size.x / 2, y: template.size.y / 2, z: template.size.z / 2 },
    };
  }

  measureExactFootprint(handle: FakeInstance): Footprint {
    const t = handle.template;
    return {
      center: {
        x: handle.position.x + t.pivotOffset.x,
        y: handle.position.y + t.pivotOffset.y,
        z: handle.position.z + t.pivotOffset.z,
      },
      extents: {
        x: (t.size.x + t.drift.x) / 2,
        y: (t.size.y + t.drift.y) / 2,
        z: (t.size.z + t.drift.z) / 2,
      },
    };
  }

  create(template: BoxTemplate, position: Vec3, orientation: number, parent: string | null): FakeInstance {
    if (template.failCreate) throw new Error(`cannot instantiate ${template.name}`);
    const inst: FakeInstance = {
      id: ++this.serial,
      template,
      position: { ...position },
      orientation,
      destroyed: false,
      committed: null,
    };
    this.instances.push(inst);
    this.parents.push(parent);
    this.events.push(`create:${inst.id}`);
    this.onCreate?.(inst);
    return inst;
  }

  destroy(handle: FakeInstance): void {
    if (handle.destroyed) throw new Error(`instance ${handle.id} destroyed twice`);
    handle.destroyed = true;
    this.events.push(`destroy:${handle.id}`);
  }

  getPosition(handle: FakeInstance): Vec3 {
    return { ...handle.position };
  }

  setPosition(handle: FakeInstance, position: Vec3): void {
    handle.position = { ...position };
  }

  onCommitted(handle: FakeInstance, item: PlacedItem<FakeInstance>): void {
    handle.committed = item;
    this.events.push(`commit:${handle.id}`);
    this.onCommit?.(handle, item);
  }
}

export function category(
  id: string,
  templates: BoxTemplate[],
  overrides: Partial<Omit<Category<BoxTemplate>, "id" | "candidateItems">> = {},
): Category<BoxTemplate> {
  return {
    id,
    candidateItems: templates.map(t => ({ id: t.name, template: t, weight: 1 })),
    minCount: 0,
    maxCount: 10,
    clearance: 0.2,
    ...overrides,
  };
}

export function squareRegion(size: number, floorY = 0): Region {
  return makeRegion({ x: 0, y: floorY, z: 0 }, { x: size, y: floorY + 3, z: size }, floorY);
}

export class FakeRegionProvider implements RegionProvider {
  readonly onRegionReadyObservable = new Observable<Region>();
  region: Region | null = null;

  getRegionBounds(): Region | null {
    return this.region;
  }

  fire(region: Region): void {
    this.region = region;
    this.onRegionReadyObservable.notifyObservers(region);
  }
}
