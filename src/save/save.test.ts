import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { World } from '../core/world';
import { defineComponent } from '../core/component';
import { selectEntities, writeSceneFile, SaveExecutor } from './save';
import { TypeRegistry } from './registry';
import { Persist } from './markers';
import { SceneError } from './errors';

const Position = defineComponent('Position', { x: 0, y: 0 });

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'scene-save-'));
  vi.spyOn(console, 'info').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('selectEntities', () => {
  test('filtered takes Persist carriers, dump takes everything', () => {
    const world = new World();
    const kept = world.spawnWith().with(Persist).id;
    const other = world.spawn();

    expect(selectEntities(world, 'filtered')).toEqual([kept]);
    expect(selectEntities(world, 'dump')).toEqual([kept, other]);
  });
});

describe('writeSceneFile', () => {
  test('creates and replaces the file, leaving no temporary behind', () => {
    const file = path.join(dir, 'world.json');
    writeSceneFile(file, 'first\n');
    writeSceneFile(file, 'second\n');

    expect(fs.readFileSync(file, 'utf-8')).toBe('second\n');
    expect(fs.readdirSync(dir)).toEqual(['world.json']);
  });

  test('fails with ERR_IO when the directory does not exist', () => {
    const file = path.join(dir, 'missing', 'world.json');
    let caught: unknown;
    try {
      writeSceneFile(file, 'text');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(SceneError);
    expect(caught).toMatchObject({ code: 'ERR_IO' });
    expect(fs.readdirSync(dir)).toEqual([]);
  });
});

describe('SaveExecutor', () => {
  test('writes the selected entities and reports the count', () => {
    const world = new World();
    world.spawnWith().with(Position, { x: 4, y: 7 }).with(Persist);
    world.spawnWith().with(Position, { x: 1 });
    const onSave = vi.fn();
    const saver = new SaveExecutor(world, new TypeRegistry().register(Position), { onSave });
    const file = path.join(dir, 'world.json');

    expect(saver.run({ kind: 'save', path: file, mode: 'filtered' })).toBe(true);

    expect(JSON.parse(fs.readFileSync(file, 'utf-8'))).toEqual({
      entities: [{ entity: 0, components: { Position: { x: 4, y: 7 } } }]
    });
    expect(onSave).toHaveBeenCalledWith(file, 1);
    expect(console.info).toHaveBeenCalledWith(`[save] save '${file}': wrote 1 entities`);
  });

  test('an empty selection is a valid empty scene', () => {
    const world = new World();
    world.spawn();
    const saver = new SaveExecutor(world, new TypeRegistry());
    const file = path.join(dir, 'empty.json');

    saver.run({ kind: 'save', path: file, mode: 'filtered' });

    expect(fs.readFileSync(file, 'utf-8')).toBe('{\n  "entities": []\n}\n');
  });

  test('a failed save keeps the previous file and leaves the world alone', () => {
    const world = new World();
    const e = world.spawnWith().with(Position, { x: 1 }).with(Persist).id;
    const onError = vi.fn();
    const saver = new SaveExecutor(world, new TypeRegistry().register(Position), { onError });
    const file = path.join(dir, 'world.json');
    const request = { kind: 'save', path: file, mode: 'filtered' } as const;

    saver.run(request);
    const before = fs.readFileSync(file, 'utf-8');

    world.add(e, Position, { x: NaN });
    expect(saver.run(request)).toBe(false);

    expect(fs.readFileSync(file, 'utf-8')).toBe(before);
    expect(fs.readdirSync(dir)).toEqual(['world.json']);
    expect(onError).toHaveBeenCalledWith(request, expect.objectContaining({ code: 'ERR_FORMAT' }));
    expect(console.error).toHaveBeenCalledWith(`[save] save '${file}' failed:`, expect.any(SceneError));
    expect(world.entityCount).toBe(1);
  });
});
