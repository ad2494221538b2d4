/**
 * @module Core/Systems/SugarScape/TradingSystem
 * @layer Core
 * @description Соседи меняют сахар на специю по среднему геометрическому их
 * предельных норм замещения (MRS = sugar / spice). Агент с большим MRS платит
 * сахаром и получает специю. Каждая пара торгует не больше раза за тик, и
 * никто не отдаёт последнюю единицу.
 */

import { AgentId } from '../../simulation/AgentArena';
import { SUGARSCAPE_CONSTANTS, SugarAgent } from '../../../entities/SugarScape';
import { SugarWorld, neighborAgents, updateAgent } from './world';

export const marginalRate = (agent: SugarAgent): number => agent.sugar / agent.spice;

export interface TradeTerms {
  /** Сахар, который платит агент с большим MRS */
  sugar: number;
  /** Специя, которую платит агент с меньшим MRS */
  spice: number;
}

/** Условия одной сделки или null, если нормы почти равны */
export const tradeTerms = (a: SugarAgent, b: SugarAgent): TradeTerms | null => {
  if (a.sugar <= 0 || a.spice <= 0 || b.sugar <= 0 || b.spice <= 0) return null;
  const rateA = marginalRate(a);
  const rateB = marginalRate(b);
  if (Math.abs(rateA - rateB) <= SUGARSCAPE_CONSTANTS.TRADE_THRESHOLD) return null;

  const price = Math.sqrt(rateA * rateB);
  return price >= 1
    ? { sugar: Math.round(price), spice: 1 }
    : { sugar: 1, spice: Math.round(1 / price) };
};

/** @returns true, если сделка состоялась */
export const trade = (world: SugarWorld, firstId: AgentId, secondId: AgentId): boolean => {
  const first = world.agents.getNext(firstId);
  const second = world.agents.getNext(secondId);
  const terms = tradeTerms(first, second);
  if (!terms) return false;

  const [sellerId, buyerId] = marginalRate(first) > marginalRate(second) ? [firstId, secondId] : [secondId, firstId];
  const seller = world.agents.getNext(sellerId);
  const buyer = world.agents.getNext(buyerId);
  if (seller.sugar <= terms.sugar || buyer.spice <= terms.spice) return false;

  updateAgent(world, sellerId, { sugar: seller.sugar - terms.sugar, spice: seller.spice + terms.spice });
  updateAgent(world, buyerId, { sugar: buyer.sugar + terms.sugar, spice: buyer.spice - terms.spice });
  return true;
};

const pairKey = (a: AgentId, b: AgentId): string => (a < b ? `${a}|${b}` : `${b}|${a}`);

/** @returns число совершённых сделок */
export const runTrading = (world: SugarWorld): number => {
  const met = new Set<string>();
  let trades = 0;

  for (const id of world.random.shuffle(world.agents.nextIds())) {
    for (const partnerId of neighborAgents(world, id)) {
      const key = pairKey(id, partnerId);
      if (met.has(key)) continue;
      met.add(key);
      if (trade(world, id, partnerId)) trades++;
    }
  }
  return trades;
};
