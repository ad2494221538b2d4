/**
 * @module Core/Systems/SugarScape/MovementSystem
 * @layer Core
 * @description Агенты смотрят вдоль четырёх осей на расстояние зрения,
 * переходят на самый богатый свободный участок (при равенстве ближайший,
 * при полном равенстве остаются на месте), собирают урожай и тратят
 * метаболизм.
 */

import { VisitationGuard } from '../../simulation/VisitationGuard';
import { AgentId } from '../../simulation/AgentArena';
import { ORTHOGONAL_OFFSETS } from '../../neighborhood/OrthogonalNeighborhood';
import { Coordinates } from '../../../shared/types';
import { SugarWorld, patchAt, positionOf, updateAgent } from './world';

interface Candidate {
  at: Coordinates;
  sugar: number;
  distance: number;
}

const isBetter = (candidate: Candidate, best: Candidate): boolean =>
  candidate.sugar > best.sugar || (candidate.sugar === best.sugar && candidate.distance < best.distance);

/**
 * Лучший участок в поле зрения из `from`. Участки, уже занятые в этом тике
 * или в подготовленном поколении, пропускаются.
 */
export const chooseDestination = (
  world: SugarWorld,
  from: Coordinates,
  vision: number,
  guard: VisitationGuard
): Coordinates => {
  let best: Candidate = { at: from, sugar: patchAt(world, from).getNextPayload().sugar, distance: 0 };

  for (const [dr, dc] of ORTHOGONAL_OFFSETS) {
    for (let distance = 1; distance <= vision; distance++) {
      const at = world.grid.locate(from.row + dr * distance, from.col + dc * distance);
      if (!at || (at.row === from.row && at.col === from.col)) continue;
      if (guard.isVisited(at.row, at.col)) continue;

      const patch = patchAt(world, at).getNextPayload();
      if (patch.agentId !== null) continue;

      const candidate = { at, sugar: patch.sugar, distance };
      if (isBetter(candidate, best)) best = candidate;
    }
  }
  return best.at;
};

const moveAgent = (world: SugarWorld, id: AgentId, guard: VisitationGuard): void => {
  const from = positionOf(world, id);
  const agent = world.agents.getNext(id);
  const to = chooseDestination(world, from, agent.vision, guard);

  if (to.row !== from.row || to.col !== from.col) {
    patchAt(world, from).stagePatch({ agentId: null });
    world.positions.set(id, to);
  }
  guard.markMove(from, to);

  const destination = patchAt(world, to);
  const harvested = destination.getNextPayload().sugar;
  destination.stagePatch({ sugar: 0, agentId: id });

  updateAgent(world, id, {
    sugar: agent.sugar + harvested - agent.metabolism,
    age: agent.age + 1
  });
};

export const runMovement = (world: SugarWorld): void => {
  const guard = new VisitationGuard(world.grid);
  const order = world.random.shuffle([...world.positions.keys()]);
  for (const id of order) {
    moveAgent(world, id, guard);
  }
};
