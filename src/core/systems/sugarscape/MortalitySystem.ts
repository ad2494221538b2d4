/**
 * @module Core/Systems/SugarScape/MortalitySystem
 * @layer Core
 * @description Агенты без сахара или старше `maxAge` умирают. Их участок
 * освобождается, а займы с их участием списываются.
 */

import { AgentId } from '../../simulation/AgentArena';
import { SugarAgent } from '../../../entities/SugarScape';
import { SugarWorld, patchAt, positionOf } from './world';

export const isDead = (agent: SugarAgent, maxAge: number): boolean =>
  agent.sugar <= 0 || agent.age > maxAge;

/** @returns дескрипторы умерших агентов */
export const runMortality = (world: SugarWorld): AgentId[] => {
  const dead = world.agents.nextIds().filter(id => isDead(world.agents.getNext(id), world.params.maxAge));

  for (const id of dead) {
    patchAt(world, positionOf(world, id)).stagePatch({ agentId: null });
    world.positions.delete(id);
    world.agents.remove(id);
  }

  if (dead.length > 0) {
    world.loans.setNext(world.loans.staged().filter(loan =>
      world.agents.hasNext(loan.lenderId) && world.agents.hasNext(loan.borrowerId)
    ));
  }
  return dead;
};
