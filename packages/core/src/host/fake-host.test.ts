import { describe, expect, it } from 'vitest';

import { FAKE_COMPONENT_TYPES, FAKE_ENTITY_TYPES, createFakeHost } from './fake-host.js';

describe('createFakeHost', () => {
  const world = {
    entities: { '5': { name: 'Bus 5' }, '30': { position: { x: 900, y: 0 } } },
    vehicles: [5],
    edges: [30, 31],
    components: { '31': { TRACK_EDGE: { p0: [0, 0], p1: [1, 1] } } },
    lineEdges: { '10': [31] },
  };

  it('answers lookups from the world description', () => {
    const host = createFakeHost(world);

    expect(host.scripting?.getVehicle?.(5)).toEqual({ name: 'Bus 5' });
    expect(host.scripting?.getVehicle?.(30)).toBeUndefined();
    expect(host.engine?.getEntityList?.(FAKE_ENTITY_TYPES.BASE_EDGE)).toEqual([30, 31]);
    expect(host.engine?.transportNetwork?.getLine?.(10)).toEqual({ edgeList: [31] });
    expect(host.engine?.transportNetwork?.getLine?.(11)).toBeUndefined();
  });

  it('accepts numeric and symbolic component types', () => {
    const host = createFakeHost(world);
    const expected = { p0: [0, 0], p1: [1, 1] };

    expect(host.engine?.getComponent?.(31, FAKE_COMPONENT_TYPES.TRACK_EDGE)).toEqual(expected);
    expect(host.engine?.getComponent?.(31, 'TRACK_EDGE')).toEqual(expected);
    expect(host.engine?.getComponent?.(31, 999)).toBeUndefined();
  });

  it('filters region scans by entity position', () => {
    const host = createFakeHost(world);
    const bounds = { minX: 0, minY: 0, maxX: 100, maxY: 100 };
    expect(host.engine?.enumerateRegion?.(bounds, FAKE_ENTITY_TYPES.BASE_EDGE)).toEqual([31]);
  });

  it('omits and breaks capabilities on request', () => {
    const host = createFakeHost(world, {
      omit: ['scripting.getVehicles', 'types'],
      failing: ['scripting.getEntity'],
    });

    expect(host.scripting?.getVehicles).toBeUndefined();
    expect(host.types).toBeUndefined();
    expect(() => host.scripting?.getEntity?.(5)).toThrow('scripting.getEntity failed');
    expect(host.calls.get('scripting.getEntity')).toBe(1);
  });
});
