import { describe, it, expect, beforeEach } from "vitest";
import { Diagnostics, Int, createPrefab, type Prefab } from "@keystone/core";
import { parsePrefab } from "@keystone/lang";
import { spawnPrefab, spawnPrefabAt } from "./spawner";
import { PrefabRegistry } from "./prefab-registry";
import { ReflectRegistry } from "../reflect/reflect-registry";
import { FieldType, field } from "../reflect/types";
import { MemoryWorld } from "../world/memory-world";
import { MemoryFileSystem } from "../vfs/vfs";

const POSITION = 1;
const HEALTH = 2;
const SPRITE = 3;
const DAMAGE = 4;

function parse(source: string): Prefab {
  const result = parsePrefab(source);
  if (!result.ok) throw result.error;
  return result.value;
}

function createReflect(): ReflectRegistry {
  const reflect = new ReflectRegistry();
  reflect.register(POSITION, "C_Position", 8, [field("x", FieldType.FLOAT, 0), field("y", FieldType.FLOAT, 4)]);
  reflect.register(HEALTH, "C_Health", 8, [field("current", FieldType.INT, 0), field("max", FieldType.INT, 4)]);
  reflect.register(SPRITE, "C_Sprite", 8, [field("texture", FieldType.STRING, 0), field("scale", FieldType.FLOAT, 4)]);
  reflect.register(DAMAGE, "C_Damage", 4, [field("amount", FieldType.INT, 0)]);
  return reflect;
}

function view(world: MemoryWorld, entity: number, component: number): DataView {
  const bytes = world.getComponent(entity, component);
  if (!bytes) throw new Error(`entity ${entity} has no component ${component}`);
  return new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
}

function position(world: MemoryWorld, entity: number): [number, number] {
  const v = view(world, entity, POSITION);
  return [v.getFloat32(0, true), v.getFloat32(4, true)];
}

describe("spawnPrefab", () => {
  let world: MemoryWorld;
  let reflect: ReflectRegistry;

  beforeEach(() => {
    world = new MemoryWorld();
    reflect = createReflect();
  });

  it("spawns a named entity with its components and child", () => {
    const prefab = parse(`
      Player @(10, 20) {
        C_Health: { current: 50, max: 100 }
        C_Sprite: { texture: "hero.png", scale: 2 }
        Weapon @(5, 0) {
          C_Damage: 3
        }
      }
    `);

    const player = spawnPrefabAt(prefab, world, reflect, 100, 100);

    expect(player).toBe(1);
    expect(world.getName(player)).toBe("Player");
    expect(view(world, player, HEALTH).getInt32(0, true)).toBe(50);
    expect(view(world, player, HEALTH).getInt32(4, true)).toBe(100);
    expect(world.strings.resolve(view(world, player, SPRITE).getUint32(0, true))).toBe("hero.png");
    expect(view(world, player, SPRITE).getFloat32(4, true)).toBe(2);

    const [weapon] = world.getChildren(player);
    expect(world.getName(weapon)).toBe("Weapon");
    expect(world.getParent(weapon)).toBe(player);
    expect(view(world, weapon, DAMAGE).getInt32(0, true)).toBe(3);
  });

  it("offsets the root but places children at their local offset", () => {
    const prefab = parse("Player @(10, 20) { Weapon @(5, 0) { } }");

    const player = spawnPrefabAt(prefab, world, reflect, 100, 100);
    const [weapon] = world.getChildren(player);

    expect(position(world, player)).toEqual([110, 120]);
    expect(position(world, weapon)).toEqual([5, 0]);
  });

  it("adds a position component even when none is declared", () => {
    const entity = spawnPrefab(parse("Rock { }"), { world, reflect });

    expect(position(world, entity)).toEqual([0, 0]);
  });

  it("writes the position into a custom component", () => {
    reflect.register(9, "Transform", 12, [field("x", FieldType.FLOAT, 0), field("y", FieldType.FLOAT, 4), field("z", FieldType.FLOAT, 8)]);

    const entity = spawnPrefab(parse("Rock @(1, 2) { }"), { world, reflect, positionComponent: "Transform" });

    expect(view(world, entity, 9).getFloat32(4, true)).toBe(2);
    expect(world.hasComponent(entity, POSITION)).toBe(false);
  });

  it("spawns bare entities without a registry", () => {
    const entity = spawnPrefab(parse("Rock { C_Health: 5 }"), { world });

    expect(world.getName(entity)).toBe("Rock");
    expect(world.hasComponent(entity, HEALTH)).toBe(false);
  });

  it("reports each entity as it is created, parents before children", () => {
    const created: number[] = [];

    spawnPrefab(parse("E { A { Leaf { } } B { } }"), { world, reflect, onCreate: (e) => created.push(e) });

    expect(created).toEqual([1, 2, 3, 4]);
    expect(world.getName(3)).toBe("Leaf");
  });

  it("links the root under a parent from the context", () => {
    const parent = world.create("Root");
    const entity = spawnPrefab(parse("Rock { }"), { world, reflect, parent });

    expect(world.getParent(entity)).toBe(parent);
  });

  describe("base prefabs", () => {
    let prefabs: PrefabRegistry;

    beforeEach(() => {
      const fileSystem = new MemoryFileSystem({
        "/base.prefab": 'Base { prefab: "/grand.prefab" C_Health: { current: 10, max: 10 } C_Damage: 1 }',
        "/grand.prefab": 'Grand { C_Sprite: { texture: "grand.png" } }',
      });
      prefabs = new PrefabRegistry({ fileSystem, reflect });
    });

    it("applies base components before the node's own", () => {
      const orc = spawnPrefab(parse('Orc { prefab: "/base.prefab" C_Health: { current: 5 } }'), { world, reflect, prefabs });

      expect(view(world, orc, HEALTH).getInt32(0, true)).toBe(5);
      expect(view(world, orc, HEALTH).getInt32(4, true)).toBe(0);
      expect(view(world, orc, DAMAGE).getInt32(0, true)).toBe(1);
      expect(prefabs.lookup("/base.prefab")?.name).toBe("Base");
    });

    it("applies a single level of inheritance", () => {
      const orc = spawnPrefab(parse('Orc { prefab: "/base.prefab" }'), { world, reflect, prefabs });

      expect(world.hasComponent(orc, SPRITE)).toBe(false);
    });

    it("reports a base prefab that cannot be loaded", () => {
      const diagnostics = new Diagnostics();
      const orc = spawnPrefab(parse('Orc { prefab: "/missing.prefab" C_Damage: 2 }'), { world, reflect, prefabs, diagnostics });

      expect(view(world, orc, DAMAGE).getInt32(0, true)).toBe(2);
      expect(diagnostics.items).toEqual([
        {
          kind: "unresolved-prefab",
          message: "Base prefab '/missing.prefab' could not be loaded: File not found: /missing.prefab",
        },
      ]);
    });

    it("spawns straight from the registry", () => {
      const entity = prefabs.spawn("/base.prefab", { world, offset: [3, 4] });

      expect(world.getName(entity)).toBe("Base");
      expect(position(world, entity)).toEqual([3, 4]);
      expect(prefabs.spawn("/missing.prefab", { world })).toBe(0);
    });
  });

  describe("diagnostics", () => {
    it("collects skipped components, fields and mismatched values", () => {
      const diagnostics = new Diagnostics();
      const entity = spawnPrefab(parse("E { Nope: 1 C_Health: { bogus: 1, current: true, max: 8 } }"), {
        world,
        reflect,
        diagnostics,
      });

      expect(diagnostics.items.map((d) => d.kind)).toEqual(["unknown-component", "unknown-field", "type-mismatch"]);
      expect(diagnostics.items.map((d) => d.message)).toEqual([
        "Unknown component 'Nope'",
        "Component 'C_Health' has no field 'bogus'",
        "Cannot assign true to C_Health.current (int)",
      ]);
      expect(view(world, entity, HEALTH).getInt32(4, true)).toBe(8);
    });

    it("throws on the first problem in strict mode", () => {
      const diagnostics = new Diagnostics({ strict: true });

      expect(() => spawnPrefab(parse("E { Nope: 1 }"), { world, reflect, diagnostics })).toThrow("Unknown component 'Nope'");
    });

    it("reports an infinite integer as a mismatch instead of aborting", () => {
      const wide = new ReflectRegistry();
      wide.register(5, "C_Big", 8, [field("v", FieldType.INT64, 0)]);
      const diagnostics = new Diagnostics();
      const prefab = createPrefab({
        name: "A",
        components: [{ name: "C_Big", fields: [{ name: "value", value: Int(Infinity) }] }],
      });

      const entity = spawnPrefab(prefab, { world, reflect: wide, diagnostics });

      expect(entity).toBe(1);
      expect(view(world, entity, 5).getBigInt64(0, true)).toBe(0n);
      expect(diagnostics.items.map((d) => d.message)).toEqual(["Cannot assign Infinity to C_Big.v (int64)"]);
    });

    it("reports a position component that is too small", () => {
      const small = new ReflectRegistry();
      small.register(1, "C_Position", 4, [field("x", FieldType.FLOAT, 0)]);
      const diagnostics = new Diagnostics();

      const entity = spawnPrefab(parse("E @(1, 1) { }"), { world, reflect: small, diagnostics });

      expect(world.hasComponent(entity, 1)).toBe(false);
      expect(diagnostics.ofKind("position-too-small")).toHaveLength(1);
    });

    it("stays silent without a collector", () => {
      expect(() => spawnPrefab(parse("E { Nope: 1 }"), { world, reflect })).not.toThrow();
    });
  });

  describe("entity creation failures", () => {
    it("returns 0 when the root cannot be created", () => {
      const full = new MemoryWorld({ maxEntities: 0 });

      expect(spawnPrefab(parse("E { }"), { world: full, reflect })).toBe(0);
    });

    it("keeps the root when a child cannot be created", () => {
      const limited = new MemoryWorld({ maxEntities: 1 });

      const root = spawnPrefab(parse("E { Child { } }"), { world: limited, reflect });

      expect(root).toBe(1);
      expect(limited.getChildren(root)).toEqual([]);
      expect(limited.count()).toBe(1);
    });
  });
});
