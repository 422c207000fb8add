import { describe, it, expect, beforeEach } from "vitest";
import { parseScene } from "@keystone/lang";
import { writeEntities, writeWorldScene, captureEntity } from "./entity-writer";
import { loadSceneString } from "./scene-manager";
import { ReflectRegistry } from "../reflect/reflect-registry";
import { FieldType, field } from "../reflect/types";
import { MemoryWorld } from "../world/memory-world";
import { spawnPrefab } from "../prefab/spawner";
import type { EntityId } from "../world/entity-store";

function createReflect(): ReflectRegistry {
  const reflect = new ReflectRegistry();
  reflect.register(1, "C_Position", 8, [field("x", FieldType.FLOAT, 0), field("y", FieldType.FLOAT, 4)]);
  reflect.register(2, "C_Health", 8, [field("current", FieldType.INT, 0), field("max", FieldType.INT, 4)]);
  reflect.register(3, "C_Name", 4, [field("text", FieldType.STRING, 0)]);
  reflect.register(4, "C_Speed", 4, [field("value", FieldType.FLOAT, 0)]);
  return reflect;
}

function spawnAll(source: string, world: MemoryWorld, reflect: ReflectRegistry): EntityId[] {
  const parsed = parseScene(source);
  if (!parsed.ok) throw parsed.error;
  return parsed.value.map((root) => spawnPrefab(root, { world, reflect }));
}

const HERO = [
  "Hero @(10, 20) {",
  "    C_Health: {",
  "        current: 5",
  "        max: 10",
  "    }",
  '    C_Name: "Aria"',
  "    C_Speed: 1.5",
  "",
  "    Pet @(1, 0) {",
  "        C_Speed: 2.0",
  "    }",
  "}",
  "",
].join("\n");

describe("writeEntities", () => {
  let world: MemoryWorld;
  let reflect: ReflectRegistry;

  beforeEach(() => {
    world = new MemoryWorld();
    reflect = createReflect();
  });

  it("writes components from their bytes in registration order", () => {
    const [hero] = spawnAll(
      'Hero @(10, 20) { C_Speed: 1.5 C_Name: "Aria" C_Health: { max: 10, current: 5 } Pet @(1, 0) { C_Speed: 2 } }',
      world,
      reflect
    );

    expect(writeEntities(world, [hero], reflect)).toBe(HERO);
  });

  it("skips entities written inside their parent and dead entities", () => {
    const [hero, gone] = spawnAll(
      'Hero @(10, 20) { C_Health: { current: 5, max: 10 } C_Name: "Aria" C_Speed: 1.5 Pet @(1, 0) { C_Speed: 2 } } Gone { }',
      world,
      reflect
    );
    const [pet] = world.getChildren(hero);
    world.delete(gone);

    expect(writeEntities(world, [hero, pet, gone], reflect)).toBe(HERO);
  });

  it("separates roots with a blank line and keeps the keyword for unnamed entities", () => {
    const roots = spawnAll("A { } Entity @(0, 3) { }", world, reflect);

    expect(writeEntities(world, roots, reflect)).toBe("A {\n}\n\nEntity @(0, 3) {\n}\n");
  });

  it("reads back to the same text", () => {
    const roots = spawnAll(HERO, world, reflect);
    const text = writeEntities(world, roots, reflect);

    const again = new MemoryWorld();
    const respawned = spawnAll(text, again, reflect);

    expect(writeEntities(again, respawned, reflect)).toBe(text);
  });

  it("writes unset strings as null", () => {
    const [entity] = spawnAll("Blank { C_Name: { } }", world, reflect);

    expect(writeEntities(world, [entity], reflect)).toBe("Blank {\n    C_Name: null\n}\n");
  });

  it("leaves the header bare without a position component", () => {
    const bare = new ReflectRegistry();
    bare.register(4, "C_Speed", 4, [field("value", FieldType.FLOAT, 0)]);
    const [entity] = spawnAll("Runner @(4, 4) { C_Speed: 3 }", world, bare);

    expect(captureEntity(world, entity, bare).position).toEqual([0, 0]);
    expect(writeEntities(world, [entity], bare)).toBe("Runner {\n    C_Speed: 3.0\n}\n");
  });
});

describe("writeWorldScene", () => {
  it("writes an instantiated scene's roots", () => {
    const world = new MemoryWorld();
    const reflect = createReflect();
    const loaded = loadSceneString("Camp @(2, 2) { C_Health: { current: 1, max: 1 } } Fire { }", "camp");
    if (!loaded.ok) throw loaded.error;
    loaded.value.instantiate(world, { reflect });

    expect(writeWorldScene(world, loaded.value, reflect)).toBe(
      "Camp @(2, 2) {\n    C_Health: {\n        current: 1\n        max: 1\n    }\n}\n\nFire {\n}\n"
    );
  });
});
