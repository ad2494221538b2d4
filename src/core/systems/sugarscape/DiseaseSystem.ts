/**
 * @module Core/Systems/SugarScape/DiseaseSystem
 * @layer Core
 * @description Болезни задаются битовыми шаблонами. Агент невосприимчив к болезни,
 * когда его иммунная строка содержит шаблон. Каждый тик иммунная система
 * переворачивает один бит в сторону каждой болезни без иммунитета, вылеченные
 * болезни снимаются, затем каждый носитель передаёт мутировавшую копию одной
 * из своих болезней каждому соседу.
 */

import { AgentId } from '../../simulation/AgentArena';
import { Pattern, SUGARSCAPE_CONSTANTS } from '../../../entities/SugarScape';
import { RandomSource } from '../../utils/random';
import { randomPattern } from './landscape';
import { SugarWorld, neighborAgents, updateAgent } from './world';

const samePattern = (a: Pattern, b: Pattern): boolean =>
  a.length === b.length && a.every((bit, i) => bit === b[i]);

export const containsPattern = (immune: Pattern, pattern: Pattern): boolean => {
  for (let start = 0; start + pattern.length <= immune.length; start++) {
    if (pattern.every((bit, i) => immune[start + i] === bit)) return true;
  }
  return false;
};

/**
 * Прикладывает шаблон там, где он лучше всего совпадает с иммунной строкой
 * (первое такое смещение), и переворачивает там первый несовпадающий бит.
 * Строка, которая короче шаблона или уже невосприимчива, не меняется.
 */
export const immuneResponse = (immune: Pattern, pattern: Pattern): Pattern => {
  let bestStart = -1;
  let bestMatches = -1;
  for (let start = 0; start + pattern.length <= immune.length; start++) {
    const matches = pattern.filter((bit, i) => immune[start + i] === bit).length;
    if (matches > bestMatches) {
      bestMatches = matches;
      bestStart = start;
    }
  }
  if (bestStart < 0) return immune;

  const mismatch = pattern.findIndex((bit, i) => immune[bestStart + i] !== bit);
  if (mismatch < 0) return immune;

  const next = [...immune];
  next[bestStart + mismatch] = pattern[mismatch];
  return next;
};

/** Копия шаблона, где каждый бит переворачивается с вероятностью `rate` */
export const mutate = (pattern: Pattern, rate: number, random: RandomSource): Pattern =>
  pattern.map(bit => (random.chance(rate) ? 1 - bit : bit));

export const randomDisease = (random: RandomSource): Pattern =>
  randomPattern(random, SUGARSCAPE_CONSTANTS.DISEASE_LENGTH);

const respond = (world: SugarWorld, id: AgentId): void => {
  const agent = world.agents.getNext(id);
  if (agent.diseases.length === 0) return;

  let immune = agent.immune;
  for (const disease of agent.diseases) {
    if (!containsPattern(immune, disease)) {
      immune = immuneResponse(immune, disease);
    }
  }
  updateAgent(world, id, {
    immune,
    diseases: agent.diseases.filter(disease => !containsPattern(immune, disease))
  });
};

export const runDisease = (world: SugarWorld): void => {
  const ids = world.agents.nextIds();
  ids.forEach(id => respond(world, id));

  // Decide every transmission before applying any, so a disease travels one hop per tick
  const transmissions: { to: AgentId; disease: Pattern }[] = [];
  for (const id of ids) {
    const { diseases } = world.agents.getNext(id);
    if (diseases.length === 0) continue;
    for (const neighborId of neighborAgents(world, id)) {
      const disease = world.random.pick(diseases);
      if (disease) {
        transmissions.push({ to: neighborId, disease: mutate(disease, world.params.diseaseMutation, world.random) });
      }
    }
  }

  for (const { to, disease } of transmissions) {
    const target = world.agents.getNext(to);
    if (target.diseases.some(carried => samePattern(carried, disease))) continue;
    updateAgent(world, to, { diseases: [...target.diseases, disease] });
  }
};
