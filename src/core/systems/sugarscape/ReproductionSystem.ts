/**
 * @module Core/Systems/SugarScape/ReproductionSystem
 * @layer Core
 * @description Плодовитые соседи противоположного пола, у каждого не меньше
 * стартового запаса, рождают одного потомка на свободном участке рядом с
 * любым из родителей. Каждый родитель отдаёт половину стартового сахара и
 * половину специи; потомок наследует усреднённые зрение и метаболизм.
 */

import { AgentId } from '../../simulation/AgentArena';
import { SUGARSCAPE_CONSTANTS, SugarAgent } from '../../../entities/SugarScape';
import { isFertile, randomPattern, randomSex } from './landscape';
import { SugarWorld, freeNeighbor, neighborAgents, patchAt, positionOf, updateAgent } from './world';

export const canReproduce = (agent: SugarAgent): boolean =>
  isFertile(agent) && agent.sugar >= agent.endowment;

const breed = (world: SugarWorld, firstId: AgentId, secondId: AgentId): AgentId | null => {
  const spot = freeNeighbor(world, positionOf(world, firstId)) ?? freeNeighbor(world, positionOf(world, secondId));
  if (!spot) return null;

  const first = world.agents.getNext(firstId);
  const second = world.agents.getNext(secondId);
  const sugarFromFirst = Math.floor(first.endowment / 2);
  const sugarFromSecond = Math.floor(second.endowment / 2);
  const spiceFromFirst = Math.floor(first.spice / 2);
  const spiceFromSecond = Math.floor(second.spice / 2);

  updateAgent(world, firstId, { sugar: first.sugar - sugarFromFirst, spice: first.spice - spiceFromFirst });
  updateAgent(world, secondId, { sugar: second.sugar - sugarFromSecond, spice: second.spice - spiceFromSecond });

  const sugar = sugarFromFirst + sugarFromSecond;
  const childId = world.agents.spawn({
    sugar,
    spice: spiceFromFirst + spiceFromSecond,
    vision: Math.floor((first.vision + second.vision) / 2),
    metabolism: Math.floor((first.metabolism + second.metabolism) / 2),
    endowment: sugar,
    sex: randomSex(world.random),
    age: 0,
    immune: randomPattern(world.random, SUGARSCAPE_CONSTANTS.IMMUNE_LENGTH),
    diseases: []
  });
  patchAt(world, spot).stagePatch({ agentId: childId });
  world.positions.set(childId, spot);
  return childId;
};

/** @returns дескрипторы потомков, рождённых в этом тике */
export const runReproduction = (world: SugarWorld): AgentId[] => {
  const parents = new Set<AgentId>();
  const children: AgentId[] = [];

  for (const id of world.random.shuffle(world.agents.nextIds())) {
    if (parents.has(id)) continue;
    const agent = world.agents.getNext(id);
    if (!canReproduce(agent)) continue;

    for (const partnerId of neighborAgents(world, id)) {
      if (parents.has(partnerId)) continue;
      const partner = world.agents.getNext(partnerId);
      if (partner.sex === agent.sex || !canReproduce(partner)) continue;

      const childId = breed(world, id, partnerId);
      if (childId === null) continue;
      parents.add(id);
      parents.add(partnerId);
      children.push(childId);
      break;
    }
  }
  return children;
};
