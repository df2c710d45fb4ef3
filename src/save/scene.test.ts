import { describe, test, expect } from 'vitest';
import { World } from '../core/world';
import { defineComponent } from '../core/component';
import { extractScene, writeSceneToWorld } from './scene';
import { TypeRegistry } from './registry';
import { SceneError } from './errors';

const Position = defineComponent('Position', { x: 0, y: 0 });
const Health = defineComponent('Health', { current: 100 });
const Sprite = defineComponent('Sprite', { frame: 0 });

describe('extractScene', () => {
  test('captures registered components only, ordered by name', () => {
    const world = new World();
    const registry = new TypeRegistry().register(Position, Health);
    const e = world.spawnWith()
      .with(Sprite, { frame: 3 })
      .with(Position, { x: 4, y: 7 })
      .with(Health, { current: 40 })
      .id;

    const scene = extractScene(world, registry, [e]);

    expect(scene).toEqual({
      entities: [{
        index: 0,
        components: [
          { type: Health, values: { current: 40 } },
          { type: Position, values: { x: 4, y: 7 } }
        ]
      }]
    });
  });

  test('captures exactly the given entities, skipping dead and repeated ones', () => {
    const world = new World();
    const registry = new TypeRegistry().register(Position);
    const a = world.spawnWith().with(Position, { x: 1 }).id;
    const b = world.spawnWith().with(Position, { x: 2 }).id;
    const c = world.spawnWith().with(Position, { x: 3 }).id;
    world.despawn(b);

    const scene = extractScene(world, registry, [c, a, b, c]);

    expect(scene.entities.map(e => e.index)).toEqual([2, 0]);
  });

  test('values are detached from the world', () => {
    const world = new World();
    const registry = new TypeRegistry().register(Position);
    const e = world.spawnWith().with(Position, { x: 1 }).id;

    const scene = extractScene(world, registry, [e]);
    world.add(e, Position, { x: 9 });

    expect(scene.entities[0].components[0].values).toEqual({ x: 1, y: 0 });
    expect(world.entityCount).toBe(1);
  });

  test('an entity with no registered component is still captured', () => {
    const world = new World();
    const e = world.spawnWith().with(Sprite).id;
    expect(extractScene(world, new TypeRegistry(), [e]).entities).toEqual([{ index: 0, components: [] }]);
  });
});

describe('writeSceneToWorld', () => {
  test('spawns fresh entities and maps saved indices to them', () => {
    const world = new World();
    world.spawn();
    world.spawn();

    const spawned = writeSceneToWorld(world, {
      entities: [
        { index: 7, components: [{ type: Position, values: { x: 4, y: 7 } }] },
        { index: 0, components: [] }
      ]
    });

    expect([...spawned]).toEqual([[7, 2], [0, 3]]);
    expect(world.read(2, Position)).toEqual({ x: 4, y: 7 });
    expect(world.getComponents(3)).toEqual([]);
  });

  test('despawns what it spawned when the world runs out of room', () => {
    const world = new World({ maxEntities: 2 });
    const existing = world.spawn();

    expect(() => writeSceneToWorld(world, {
      entities: [
        { index: 0, components: [{ type: Health, values: { current: 1 } }] },
        { index: 1, components: [{ type: Health, values: { current: 2 } }] }
      ]
    })).toThrow(/Entity limit exceeded/);

    expect(world.getAllEntityIds()).toEqual([existing]);
    expect(world.query(Health).count()).toBe(0);
  });

  test('rejects a repeated index', () => {
    const world = new World();
    expect(() => writeSceneToWorld(world, {
      entities: [{ index: 1, components: [] }, { index: 1, components: [] }]
    })).toThrow(SceneError);
    expect(world.entityCount).toBe(0);
  });
});

describe('TypeRegistry', () => {
  test('re-registering the same definition is allowed', () => {
    const registry = new TypeRegistry().register(Position).register(Position);
    expect(registry.size).toBe(1);
    expect(registry.get('Position')).toBe(Position);
  });

  test('a different definition under a taken name throws', () => {
    const registry = new TypeRegistry().register(Position);
    const Impostor = defineComponent('Position', { x: 0 });
    expect(() => registry.register(Impostor)).toThrow(`Another component is already registered as 'Position'`);
    expect(registry.has(Impostor)).toBe(false);
  });
});
