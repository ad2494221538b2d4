/**
 * @module Core/Systems/SugarScape/GrowbackSystem
 * @layer Core
 * @description Незанятые участки отращивают `growBackRate` сахара каждые
 * `growBackInterval` тиков, не больше своей ёмкости.
 */

import { SugarWorld, patchAt } from './world';

export const runGrowback = (world: SugarWorld): void => {
  const { growBackRate, growBackInterval } = world.params;
  if (world.tick % growBackInterval !== 0) return;

  for (const at of world.grid.coordinates()) {
    const cell = patchAt(world, at);
    const patch = cell.getNextPayload();
    if (patch.agentId !== null) continue;

    const sugar = Math.min(patch.capacity, patch.sugar + growBackRate);
    if (sugar !== patch.sugar) {
      cell.stagePatch({ sugar });
    }
  }
};
